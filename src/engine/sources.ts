import { validatePath } from './accessGuard.js';
import { SecurityViolationError } from './errors.js';
import type { LocalSource, RemoteHost, RemoteSource } from './types.js';

export type SourceParams = {
  sourceId: string;
  group: string;
  label: string;
  path: string;
  encoding: string;
  alwaysOn: boolean;
};

/** Builds a local source; throws `SecurityViolationError` when the guard rejects the path. */
export function createLocalSource(params: SourceParams, allowedPaths: readonly string[]): LocalSource {
  const check = validatePath(params.path, allowedPaths, 'local');
  if (!check.ok) {
    throw new SecurityViolationError(check.reason, check.message);
  }

  return {
    ...params,
    kind: 'local-file',
    path: check.normalizedPath,
    lastKnownSize: 0,
    lastSeq: 0,
    resumeOffset: null,
    lastKnownInode: null
  };
}

export function createRemoteSource(params: SourceParams, host: RemoteHost): RemoteSource {
  const check = validatePath(params.path, host.allowedPaths, 'remote');
  if (!check.ok) {
    throw new SecurityViolationError(check.reason, check.message);
  }

  return {
    ...params,
    kind: 'remote-file',
    path: check.normalizedPath,
    host,
    lastKnownSize: 0,
    lastSeq: 0,
    resumeOffset: null
  };
}

/** `a/b.log` style id part: forward slashes, no leading separator. */
export function relativeId(root: string, filePath: string): string {
  const prefix = root.endsWith('/') ? root : `${root}/`;
  return filePath.startsWith(prefix) ? filePath.slice(prefix.length) : filePath.replace(/^\/+/, '');
}
