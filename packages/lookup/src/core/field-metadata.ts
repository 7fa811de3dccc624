import type { FieldTags } from "./fields"

export type FieldMetadata = {
  readonly key: string
  readonly optional: boolean
}

type TagSystem = {
  readonly tag: keyof FieldTags
  readonly optionalMarker: string
}

/** Tag systems in priority order. The first one present wins. */
export const TAG_SYSTEMS: readonly TagSystem[] = [
  { tag: "json", optionalMarker: "omitempty" },
  { tag: "lookup", optionalMarker: "optional" },
]

/**
 * Determines the lookup key and optionality of a field.
 *
 * Returns `undefined` when the field carries no recognized, non-empty tag;
 * such fields are left out of resolution entirely.
 */
export function extractFieldMetadata(name: string, tags: FieldTags): FieldMetadata | undefined {
  for (const { tag, optionalMarker } of TAG_SYSTEMS) {
    const value = tags[tag]
    if (!value) continue

    const [key = "", marker] = value.split(",")

    return {
      // `json:",omitempty"` keeps the field's own name
      key: key === "" ? name : key,
      optional: marker === optionalMarker,
    }
  }

  return undefined
}
