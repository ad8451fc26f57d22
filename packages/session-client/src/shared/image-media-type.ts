export type ImageMediaType = "image/png" | "image/gif" | "image/webp" | "image/heic" | "image/jpeg";

function startsWith(bytes: Uint8Array, offset: number, signature: readonly number[]): boolean {
  if (bytes.length < offset + signature.length) {
    return false;
  }
  return signature.every((byte, index) => bytes[offset + index] === byte);
}

const PNG = [0x89, 0x50, 0x4e, 0x47];
const GIF = [0x47, 0x49, 0x46, 0x38];
const RIFF = [0x52, 0x49, 0x46, 0x46];
const WEBP = [0x57, 0x45, 0x42, 0x50];
const FTYP = [0x66, 0x74, 0x79, 0x70];

export function detectImageMediaType(bytes: Uint8Array): ImageMediaType {
  if (startsWith(bytes, 0, PNG)) {
    return "image/png";
  }
  if (startsWith(bytes, 0, GIF)) {
    return "image/gif";
  }
  if (startsWith(bytes, 0, RIFF) && startsWith(bytes, 8, WEBP)) {
    return "image/webp";
  }
  if (startsWith(bytes, 4, FTYP)) {
    return "image/heic";
  }
  return "image/jpeg";
}

export function encodeImageAttachment(bytes: Uint8Array): {
  mediaType: ImageMediaType;
  base64Data: string;
} {
  return {
    mediaType: detectImageMediaType(bytes),
    base64Data: Buffer.from(bytes).toString("base64"),
  };
}
