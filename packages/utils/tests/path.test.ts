import { describe, it, expect } from 'vitest';
import { getExtension, remoteBasename, remoteParentDir, sanitizeFilename } from '../src/path.js';

describe('path utilities', () => {
  it('sanitizes reserved characters', () => {
    expect(sanitizeFilename('AC/DC: Back in Black?.flac')).toBe('AC_DC_ Back in Black_.flac');
  });

  it('reads the lowercase extension', () => {
    expect(getExtension('Track.FLAC')).toBe('flac');
  });

  it('splits remote paths on either separator', () => {
    expect(remoteBasename('@@share\\Music\\Artist\\01 - Intro.mp3')).toBe('01 - Intro.mp3');
    expect(remoteParentDir('@@share\\Music\\Artist\\01 - Intro.mp3')).toBe('Artist');
    expect(remoteBasename('music/album/track.ogg')).toBe('track.ogg');
    expect(remoteParentDir('track.ogg')).toBe('');
  });
});
