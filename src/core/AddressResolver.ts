/**
 * Address classification and device-root/save-directory arithmetic.
 *
 * Address syntax:
 *   local   /data/logs, ~/exports, D:\logs
 *   remote  user@host:/path     (both '@' and ':' present)
 *   cloud   scheme://bucket[/prefix]
 *
 * Kinds are derived from the string on every call; nothing is cached.
 */

import * as os from 'os';
import * as path from 'path';
import { AddressKindError } from './errors.js';

export type AddressKind = 'local' | 'remote' | 'cloud';

export interface RemoteAddress {
  user: string;
  host: string;
  path: string;
}

const CLOUD_SCHEME = /^[A-Za-z][A-Za-z0-9+.-]*:\/\//;

function stripTrailingSlashes(value: string): string {
  return value.replace(/\/+$/, '');
}

/**
 * Split at the last '/'. found is false when there is no '/'.
 */
function rpartition(value: string): { head: string; tail: string; found: boolean } {
  const index = value.lastIndexOf('/');
  if (index === -1) {
    return { head: '', tail: value, found: false };
  }
  return { head: value.slice(0, index), tail: value.slice(index + 1), found: true };
}

export class AddressResolver {
  isRemote(address: string): boolean {
    return address.includes('@') && address.includes(':');
  }

  isCloud(address: string): boolean {
    return CLOUD_SCHEME.test(address);
  }

  /**
   * Cloud wins over remote: "s3://user@bucket" is a cloud address.
   */
  kindOf(address: string): AddressKind {
    if (this.isCloud(address)) return 'cloud';
    if (this.isRemote(address)) return 'remote';
    return 'local';
  }

  /**
   * Append a save directory to a device root.
   */
  join(device: string, relativeDir: string): string {
    const cleanDir = relativeDir.trim().replace(/^\/+|\/+$/g, '');

    if (this.isCloud(device)) {
      return cleanDir ? `${stripTrailingSlashes(device)}/${cleanDir}` : device;
    }

    if (this.isRemote(device)) {
      const colon = device.indexOf(':');
      const userHost = device.slice(0, colon);
      const remoteBase = stripTrailingSlashes(device.slice(colon + 1));
      return cleanDir ? `${userHost}:${remoteBase}/${cleanDir}` : `${userHost}:${remoteBase}`;
    }

    return cleanDir ? path.join(device, cleanDir) : device;
  }

  /**
   * Inverse of join: [parent, leaf]. The leaf is '' when there is nothing to split off.
   */
  split(address: string): [string, string] {
    if (this.isCloud(address)) {
      const { head, tail, found } = rpartition(stripTrailingSlashes(address));
      if (found && this.isCloud(head)) {
        return [head, tail];
      }
      return [address, ''];
    }

    if (this.isRemote(address)) {
      const colon = address.indexOf(':');
      const userHost = address.slice(0, colon);
      const { head, tail, found } = rpartition(stripTrailingSlashes(address.slice(colon + 1)));
      if (found) {
        return [`${userHost}:${head || '/'}`, tail];
      }
      return [address, ''];
    }

    const leaf = path.basename(address);
    if (!leaf) {
      return [address, ''];
    }
    return [path.dirname(address), leaf];
  }

  /**
   * @throws AddressKindError when the address is not user@host:path
   */
  splitRemote(address: string): RemoteAddress {
    if (!this.isRemote(address)) {
      throw new AddressKindError(address, 'remote (user@host:path)');
    }
    const colon = address.indexOf(':');
    const userHost = address.slice(0, colon);
    const at = userHost.indexOf('@');
    if (at === -1) {
      // '@' only appears after the first ':', e.g. "host:/x@y"
      throw new AddressKindError(address, 'remote (user@host:path)');
    }
    return {
      user: userHost.slice(0, at),
      host: userHost.slice(at + 1),
      path: address.slice(colon + 1),
    };
  }
}

/**
 * Expand a leading "~" to the current user's home directory.
 */
export function expandHome(localPath: string): string {
  if (localPath === '~') {
    return os.homedir();
  }
  if (localPath.startsWith('~/')) {
    return path.join(os.homedir(), localPath.slice(2));
  }
  return localPath;
}
