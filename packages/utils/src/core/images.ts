import { Encoding } from "effect"

import { InvalidArgumentError } from "./errors.js"

export type ImageMimeType = "image/png" | "image/jpeg" | "image/gif" | "image/webp"

const asciiBytes = (text: string): ReadonlyArray<number> => Array.from(text, (char) => char.charCodeAt(0))

const pngSignature: ReadonlyArray<number> = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]
const jpegSignature: ReadonlyArray<number> = [0xff, 0xd8, 0xff]
const gifSignatures: ReadonlyArray<ReadonlyArray<number>> = [asciiBytes("GIF87a"), asciiBytes("GIF89a")]
const jfifMarkers: ReadonlyArray<ReadonlyArray<number>> = [asciiBytes("JFIF"), asciiBytes("Exif")]
const riffMarker = asciiBytes("RIFF")
const webpMarker = asciiBytes("WEBP")

const matchesAt = (data: Uint8Array, offset: number, expected: ReadonlyArray<number>): boolean =>
  data.length >= offset + expected.length && expected.every((byte, index) => data[offset + index] === byte)

const isJpeg = (data: Uint8Array): boolean =>
  matchesAt(data, 0, jpegSignature) || jfifMarkers.some((marker) => matchesAt(data, 6, marker))

// CHANGE: sniff the image format from its magic bytes
// WHY: avatar and icon uploads are sent as data URIs that must carry the right MIME type
// SOURCE: n/a
// FORMAT THEOREM: forall b: mime(b) ∈ {png, jpeg, gif, webp} ∨ throws
// PURITY: CORE
// INVARIANT: only the leading 12 bytes are inspected
// COMPLEXITY: O(1)/O(1)
export const getMimeTypeForImage = (data: Uint8Array): ImageMimeType => {
  if (matchesAt(data, 0, pngSignature)) {
    return "image/png"
  }
  if (isJpeg(data)) {
    return "image/jpeg"
  }
  if (gifSignatures.some((signature) => matchesAt(data, 0, signature))) {
    return "image/gif"
  }
  if (matchesAt(data, 0, riffMarker) && matchesAt(data, 8, webpMarker)) {
    return "image/webp"
  }
  throw new InvalidArgumentError({ message: "Unsupported image type given" })
}

export const bytesToBase64Data = (data: Uint8Array): string =>
  `data:${getMimeTypeForImage(data)};base64,${Encoding.encodeBase64(data)}`
