import { describe, it, expect } from 'vitest';
import { infoHashFromMagnet } from '../../src/utils/magnet';

describe('infoHashFromMagnet', () => {
  it('reads a hex info hash and lowercases it', () => {
    expect(infoHashFromMagnet('magnet:?xt=urn:btih:ABCDEF0123456789ABCDEF0123456789ABCDEF01&dn=UFC+300'))
      .toBe('abcdef0123456789abcdef0123456789abcdef01');
  });

  it('converts a base32 info hash to hex', () => {
    expect(infoHashFromMagnet(`magnet:?dn=UFC&xt=urn:btih:${'7'.repeat(32)}`)).toBe('f'.repeat(40));
    expect(infoHashFromMagnet(`magnet:?xt=urn:btih:${'A'.repeat(32)}`)).toBe('0'.repeat(40));
  });

  it('ignores links that are not magnets or carry no usable hash', () => {
    expect(infoHashFromMagnet('https://tracker.test/download/1.torrent')).toBeUndefined();
    expect(infoHashFromMagnet('magnet:?dn=UFC+300')).toBeUndefined();
    expect(infoHashFromMagnet('magnet:?xt=urn:btih:abc123')).toBeUndefined();
  });
});
