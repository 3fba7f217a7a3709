/**
 * Network Drive Detection Tests
 */

import { isNetworkDrive, resolveWorkerCount } from '../../src/utils/networkDrive.js';

describe('isNetworkDrive', () => {
  it('should flag UNC paths', () => {
    expect(isNetworkDrive('//server/share/movie.mp4')).toBe(true);
    expect(isNetworkDrive('\\\\server\\share\\movie.mp4')).toBe(true);
  });

  it('should flag common mount roots', () => {
    expect(isNetworkDrive('/mnt/nas/movie.mp4')).toBe(true);
    expect(isNetworkDrive('/media/usb/movie.mp4')).toBe(true);
    expect(isNetworkDrive('/Volumes/Share/movie.mp4')).toBe(true);
  });

  it('should flag filesystem type fragments anywhere in the path', () => {
    expect(isNetworkDrive('/srv/NFS-exports/movie.mp4')).toBe(true);
    expect(isNetworkDrive('/home/user/smb/movie.mp4')).toBe(true);
  });

  it('should treat ordinary local paths as local', () => {
    expect(isNetworkDrive('/home/user/videos/movie.mp4')).toBe(false);
    expect(isNetworkDrive('/data/clips/a.mkv')).toBe(false);
  });
});

describe('resolveWorkerCount', () => {
  const local = ['/home/user/videos/a.mp4', '/home/user/videos/b.mp4'];

  it('should use one worker per core for local paths', () => {
    expect(resolveWorkerCount(local, undefined, 8)).toBe(8);
  });

  it('should force a single worker when any path is on a network drive', () => {
    expect(resolveWorkerCount([...local, '/mnt/nas/c.mp4'], undefined, 8)).toBe(1);
  });

  it('should let a positive override win over the network policy', () => {
    expect(resolveWorkerCount(['/mnt/nas/c.mp4'], 3, 8)).toBe(3);
  });

  it('should ignore a zero override', () => {
    expect(resolveWorkerCount(local, 0, 4)).toBe(4);
  });

  it('should never return fewer than one worker', () => {
    expect(resolveWorkerCount(local, undefined, 0)).toBe(1);
  });
});
