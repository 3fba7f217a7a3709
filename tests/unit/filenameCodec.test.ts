/**
 * Filename Metadata Codec Tests
 */

import {
  decodeFilename,
  encodeFilename,
  extractHash,
  hashesEqual,
  isTagged,
  isVideoFile,
} from '../../src/services/media/filenameCodec.js';
import { InputValidationError } from '../../src/errors/index.js';

describe('filenameCodec', () => {
  describe('isVideoFile', () => {
    it('should accept every recognised container regardless of case', () => {
      for (const name of ['a.mp4', 'a.webm', 'a.mov', 'a.flv', 'a.mkv', 'a.avi', 'a.wmv', 'a.mpg', 'B.MKV', 'c.Mp4']) {
        expect(isVideoFile(name)).toBe(true);
      }
    });

    it('should reject other extensions and extensionless names', () => {
      expect(isVideoFile('notes.txt')).toBe(false);
      expect(isVideoFile('movie.mp4.part')).toBe(false);
      expect(isVideoFile('README')).toBe(false);
    });
  });

  describe('encodeFilename', () => {
    it('should append the suffix before the extension and upper-case the hash', () => {
      expect(
        encodeFilename('/videos/clip.mp4', { resolution: '1280x720', durationMinutes: 33, hash: '996a868b' })
      ).toBe('/videos/clip_[1280x720][33min][996A868B].mp4');
    });

    it('should round fractional minutes half-up', () => {
      expect(encodeFilename('a.mkv', { resolution: '1x1', durationMinutes: 29.5, hash: '00000000' })).toBe(
        'a_[1x1][30min][00000000].mkv'
      );
      expect(encodeFilename('a.mkv', { resolution: '1x1', durationMinutes: 0.4, hash: '00000000' })).toBe(
        'a_[1x1][0min][00000000].mkv'
      );
    });

    it('should keep the original extension case', () => {
      expect(encodeFilename('/x/Holiday.MOV', { resolution: '640x480', durationMinutes: 2, hash: 'ABCDEF01' })).toBe(
        '/x/Holiday_[640x480][2min][ABCDEF01].MOV'
      );
    });

    it('should reject a malformed resolution', () => {
      expect(() => encodeFilename('a.mp4', { resolution: '1920', durationMinutes: 1, hash: 'ABCDEF01' })).toThrow(
        InputValidationError
      );
    });

    it('should reject a negative duration', () => {
      expect(() => encodeFilename('a.mp4', { resolution: '1x1', durationMinutes: -1, hash: 'ABCDEF01' })).toThrow(
        'invalid duration: -1'
      );
    });

    it('should reject a hash that is not 8 hex digits', () => {
      expect(() => encodeFilename('a.mp4', { resolution: '1x1', durationMinutes: 1, hash: 'XYZ' })).toThrow(
        'invalid hash: XYZ'
      );
    });

    it('should produce a name that classifies as tagged and yields the same hash', () => {
      const tagged = encodeFilename('/v/clip.webm', { resolution: '1920x1080', durationMinutes: 12, hash: 'deadbeef' });
      expect(isTagged(tagged)).toBe(true);
      expect(extractHash(tagged)).toBe('DEADBEEF');
    });
  });

  describe('isTagged', () => {
    it('should recognise a name that ends with the suffix', () => {
      expect(isTagged('Show[S02E03][HD]_[3840x2160][30min][FEDCBA98].webm')).toBe(true);
    });

    it('should reject a partial suffix', () => {
      expect(isTagged('video_[1920x1080].mp4')).toBe(false);
      expect(isTagged('video_[1920x1080][30min].mp4')).toBe(false);
    });

    it('should only look at the final path segment', () => {
      expect(isTagged('/dir_[1x1][1min][ABCDEF01].mp4/plain.mp4')).toBe(false);
    });

    it('should reject text between the suffix and the extension', () => {
      expect(isTagged('a_[1x1][1min][ABCDEF01] copy.mp4')).toBe(false);
    });
  });

  describe('extractHash', () => {
    it('should return the hash of a tagged name', () => {
      expect(extractHash('Show[S02E03][HD]_[3840x2160][30min][FEDCBA98].webm')).toBe('FEDCBA98');
    });

    it('should take the last 8-hex token when the name has several', () => {
      expect(extractHash('/v/Movie [12345678]_[1x1][1min][ABCDEF01].mp4')).toBe('ABCDEF01');
    });

    it('should preserve the letter case found in the name', () => {
      expect(extractHash('x_[1x1][1min][deadbeef].mkv')).toBe('deadbeef');
    });

    it('should return undefined for untagged names', () => {
      expect(extractHash('video_[1920x1080].mp4')).toBeUndefined();
      expect(extractHash('Movie [ABCDEF01].mp4')).toBeUndefined();
    });
  });

  describe('decodeFilename', () => {
    it('should return the full triple of a tagged name', () => {
      expect(decodeFilename('/v/clip_[1280x720][33min][996A868B].mp4')).toEqual({
        resolution: '1280x720',
        durationMinutes: 33,
        hash: '996A868B',
      });
    });

    it('should return undefined for an untagged name', () => {
      expect(decodeFilename('/v/clip.mp4')).toBeUndefined();
    });
  });

  describe('hashesEqual', () => {
    it('should compare without regard to case', () => {
      expect(hashesEqual('deadbeef', 'DEADBEEF')).toBe(true);
      expect(hashesEqual('deadbeef', 'DEADBEE0')).toBe(false);
    });
  });
});
