import fs from "node:fs/promises"
import path from "node:path"
import { describeLookupSourceContract } from "../../../ports/__tests__/source.contract"
import { DotenvSource } from "../dotenv-source"

describeLookupSourceContract({
  name: "DotenvSource",
  make: async (cwd) => ({
    source: new DotenvSource({ file: ".env", required: true, cwd }),
  }),
  setup: async (cwd) => {
    await fs.writeFile(path.join(cwd, ".env"), "TEST_KEY=test_value\nEMPTY_KEY=")
  },
  present: () => ({ TEST_KEY: "test_value", EMPTY_KEY: "" }),
  absentKey: "MISSING_KEY",
})
