import { describe, it, expect } from '@jest/globals';
import * as os from 'os';
import * as path from 'path';
import { AddressResolver, expandHome } from '../../../src/core/AddressResolver.js';
import { AddressKindError } from '../../../src/core/errors.js';

describe('AddressResolver', () => {
  const resolver = new AddressResolver();

  describe('classification', () => {
    it('should treat user@host:path as remote', () => {
      expect(resolver.isRemote('user@host:/path')).toBe(true);
      expect(resolver.isRemote('/local/path')).toBe(false);
      expect(resolver.isRemote('scheme://bucket/x')).toBe(false);
    });

    it('should treat any URL scheme as cloud', () => {
      expect(resolver.isCloud('scheme://bucket/x')).toBe(true);
      expect(resolver.isCloud('s3+v2://bucket')).toBe(true);
      expect(resolver.isCloud('user@host:/path')).toBe(false);
      expect(resolver.isCloud('C:\\logs')).toBe(false);
      expect(resolver.isCloud('1x://bucket')).toBe(false);
    });

    it('should check cloud before remote', () => {
      expect(resolver.kindOf('scheme://user@bucket:9000/x')).toBe('cloud');
      expect(resolver.kindOf('eng@10.0.0.5:/data')).toBe('remote');
      expect(resolver.kindOf('~/exports')).toBe('local');
    });
  });

  describe('join', () => {
    it('should append to a cloud root', () => {
      expect(resolver.join('scheme://bucket', 'logs')).toBe('scheme://bucket/logs');
      expect(resolver.join('scheme://bucket/', '/logs/')).toBe('scheme://bucket/logs');
    });

    it('should append to a remote base without doubling slashes', () => {
      expect(resolver.join('user@host:/base/', 'logs/')).toBe('user@host:/base/logs');
      expect(resolver.join('user@host:/base/', '')).toBe('user@host:/base');
    });

    it('should path-join local roots after trimming the directory', () => {
      expect(resolver.join('/mnt/usb', ' /logs/ ')).toBe('/mnt/usb/logs');
      expect(resolver.join('/mnt/usb', '')).toBe('/mnt/usb');
    });
  });

  describe('split', () => {
    it('should split cloud addresses only below the bucket', () => {
      expect(resolver.split('scheme://bucket/p')).toEqual(['scheme://bucket', 'p']);
      expect(resolver.split('scheme://bucket/a/b/')).toEqual(['scheme://bucket/a', 'b']);
      expect(resolver.split('scheme://bucket')).toEqual(['scheme://bucket', '']);
    });

    it('should keep user@host attached for remote addresses', () => {
      expect(resolver.split('user@host:/base/logs')).toEqual(['user@host:/base', 'logs']);
      expect(resolver.split('user@host:/data')).toEqual(['user@host:/', 'data']);
      expect(resolver.split('user@host:data')).toEqual(['user@host:data', '']);
    });

    it('should use dirname and basename for local paths', () => {
      expect(resolver.split('/mnt/usb/logs')).toEqual(['/mnt/usb', 'logs']);
      expect(resolver.split('/')).toEqual(['/', '']);
    });

    it('should invert join', () => {
      const devices = ['/mnt/usb', 'relative/root', 'scheme://bucket', 'scheme://bucket/prefix', 'eng@10.0.0.5:/data'];
      const dirs = ['logs', 'capture-2026', 'x'];
      for (const device of devices) {
        for (const dir of dirs) {
          expect(resolver.split(resolver.join(device, dir))).toEqual([device, dir]);
        }
      }
    });
  });

  describe('splitRemote', () => {
    it('should split user, host and path at the first colon', () => {
      expect(resolver.splitRemote('eng@10.0.0.5:/data/a:b')).toEqual({
        user: 'eng',
        host: '10.0.0.5',
        path: '/data/a:b',
      });
    });

    it('should reject non-remote addresses', () => {
      expect(() => resolver.splitRemote('/local/path')).toThrow(AddressKindError);
      expect(() => resolver.splitRemote('/local/path')).toThrow(
        'Address is not remote (user@host:path): /local/path'
      );
    });

    it('should reject an @ that only appears in the path', () => {
      expect(() => resolver.splitRemote('host:/x@y')).toThrow(AddressKindError);
    });
  });
});

describe('expandHome', () => {
  it('should expand ~ and ~/ only', () => {
    expect(expandHome('~')).toBe(os.homedir());
    expect(expandHome('~/exports')).toBe(path.join(os.homedir(), 'exports'));
    expect(expandHome('~other/x')).toBe('~other/x');
    expect(expandHome('/abs/path')).toBe('/abs/path');
  });
});
