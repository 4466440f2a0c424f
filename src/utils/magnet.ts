const BASE32_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ234567';

function base32ToHex(value: string): string | undefined {
  let bits = '';
  for (const char of value.toUpperCase()) {
    const index = BASE32_ALPHABET.indexOf(char);
    if (index < 0) return undefined;
    bits += index.toString(2).padStart(5, '0');
  }

  let hex = '';
  for (let offset = 0; offset + 4 <= bits.length; offset += 4) {
    hex += parseInt(bits.slice(offset, offset + 4), 2).toString(16);
  }
  return hex;
}

/**
 * Info hash named by a magnet link's `xt=urn:btih:` parameter, as lowercase
 * hex. Accepts the 40-character hex and 32-character base32 forms.
 */
export function infoHashFromMagnet(url: string): string | undefined {
  if (!url.toLowerCase().startsWith('magnet:')) return undefined;

  const match = url.match(/[?&]xt=urn:btih:([0-9a-z]+)/i);
  if (!match) return undefined;

  const hash = match[1];
  if (/^[0-9a-f]{40}$/i.test(hash)) return hash.toLowerCase();
  if (hash.length === 32) return base32ToHex(hash);
  return undefined;
}
