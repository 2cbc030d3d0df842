import type { VideoInspection } from '@/types/storyboard';

const HEX_PREFIX_BYTES = 16;

function ascii(bytes: Uint8Array, start: number, end: number): string | null {
  if (bytes.length < end) return null;
  let out = '';
  for (let i = start; i < end; i += 1) {
    out += String.fromCharCode(bytes[i]);
  }
  return out;
}

export function hexPrefix(bytes: Uint8Array, length = HEX_PREFIX_BYTES): string {
  return Array.from(bytes.subarray(0, length), (byte) => byte.toString(16).padStart(2, '0')).join(' ');
}

/** Bytes 4-7 hold the first ISO-BMFF box type (`ftyp` for MP4); bytes 8-11 its major brand. */
export function inspectMp4(bytes: Uint8Array, contentType: string | null = null): VideoInspection {
  const containerFourCc = ascii(bytes, 4, 8);
  const isLikelyMp4 = containerFourCc === 'ftyp';
  return {
    contentType,
    byteLength: bytes.length,
    containerFourCc,
    majorBrand: ascii(bytes, 8, 12),
    hexPrefix: hexPrefix(bytes),
    isLikelyMp4
  };
}

export function emptyInspection(): VideoInspection {
  return { contentType: null, byteLength: 0, containerFourCc: null, majorBrand: null, hexPrefix: '', isLikelyMp4: false };
}
