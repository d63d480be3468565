import { realpathSync } from 'node:fs';
import path from 'node:path';

export type GuardRejectionReason =
  | 'path-outside-whitelist'
  | 'path-denylisted'
  | 'command-verb-not-allowed'
  | 'command-has-metacharacter'
  | 'size-exceeded';

export type GuardRejection = { ok: false; reason: GuardRejectionReason; message: string };

export type PathCheck = { ok: true; normalizedPath: string } | GuardRejection;

export type GuardCheck = { ok: true } | GuardRejection;

export type PathFlavor = 'local' | 'remote';

export const DEFAULT_ALLOWED_VERBS: readonly string[] = ['tail', 'cat', 'head', 'ls', 'find'];

const SHELL_METACHARACTERS: readonly string[] = [';', '|', '&', '`', '$', '>', '<', '\n', '\r'];

// Matched against the normalized path; wins over the allow-list.
const DENYLIST: readonly RegExp[] = [
  /^\/etc\/shadow$/,
  /^\/etc\/gshadow$/,
  /^\/etc\/passwd$/,
  /^\/etc\/sudoers(\.d)?(\/|$)/,
  /(^|\/)\.ssh(\/|$)/,
  /^\/proc(\/|$)/,
  /^\/sys(\/|$)/,
  /\.pem$/i,
  /\.key$/i
];

function reject(reason: GuardRejectionReason, message: string): GuardRejection {
  return { ok: false, reason, message };
}

function hasParentSegment(candidate: string): boolean {
  return candidate.split(/[\\/]+/).includes('..');
}

function normalizeLocal(candidate: string): string {
  const resolved = path.resolve(candidate);
  try {
    return realpathSync.native(resolved);
  } catch {
    // Not there yet (a log about to be created): compare the lexical form.
    return resolved;
  }
}

function normalize(candidate: string, flavor: PathFlavor): string {
  if (flavor === 'remote') {
    const normalized = path.posix.normalize(candidate);
    return normalized.length > 1 ? normalized.replace(/\/+$/, '') : normalized;
  }
  return normalizeLocal(candidate);
}

function isAbsolute(candidate: string, flavor: PathFlavor): boolean {
  return flavor === 'remote' ? path.posix.isAbsolute(candidate) : path.isAbsolute(candidate);
}

export function isWithinPrefix(normalizedPath: string, prefix: string): boolean {
  if (normalizedPath === prefix) {
    return true;
  }
  const withSlash = prefix.endsWith('/') ? prefix : `${prefix}/`;
  return normalizedPath.startsWith(withSlash);
}

export function isDenylisted(normalizedPath: string): boolean {
  return DENYLIST.some((pattern) => pattern.test(normalizedPath));
}

/**
 * Approves a path for reading only when, after normalization, it sits inside
 * one of `allowedPrefixes` and is not on the sensitive-path deny-list.
 *
 * Local paths are resolved through symlinks; remote paths are normalized
 * lexically with POSIX rules.
 */
export function validatePath(
  candidatePath: string,
  allowedPrefixes: readonly string[],
  flavor: PathFlavor = 'local'
): PathCheck {
  const candidate = candidatePath.trim();
  if (!candidate) {
    return reject('path-outside-whitelist', 'path is empty');
  }

  if (hasParentSegment(candidate)) {
    return reject('path-denylisted', `path contains a parent-directory segment: ${candidate}`);
  }

  if (!isAbsolute(candidate, flavor)) {
    return reject('path-outside-whitelist', `path must be absolute: ${candidate}`);
  }

  const normalizedPath = normalize(candidate, flavor);
  if (isDenylisted(normalizedPath)) {
    return reject('path-denylisted', `path is on the deny-list: ${normalizedPath}`);
  }

  const allowed = allowedPrefixes
    .map((prefix) => prefix.trim())
    .filter((prefix) => prefix.length > 0 && isAbsolute(prefix, flavor))
    .map((prefix) => normalize(prefix, flavor));

  if (!allowed.some((prefix) => isWithinPrefix(normalizedPath, prefix))) {
    return reject('path-outside-whitelist', `path is outside the allowed prefixes: ${normalizedPath}`);
  }

  return { ok: true, normalizedPath };
}

/**
 * Commands are issued to the remote side as a single string, so the
 * metacharacter check runs whatever the verb.
 */
export function validateCommand(
  candidateCommand: string,
  allowedVerbs: readonly string[] = DEFAULT_ALLOWED_VERBS
): GuardCheck {
  const found = SHELL_METACHARACTERS.find((ch) => candidateCommand.includes(ch));
  if (found !== undefined) {
    return reject('command-has-metacharacter', `command contains ${JSON.stringify(found)}`);
  }

  const verb = candidateCommand.trim().split(/\s+/)[0] ?? '';
  if (!allowedVerbs.includes(verb)) {
    return reject('command-verb-not-allowed', `command verb not allowed: ${verb || '(empty)'}`);
  }

  return { ok: true };
}

export function checkFileSize(observedSize: number, maxSize: number): GuardCheck {
  if (!Number.isFinite(observedSize) || observedSize < 0) {
    return reject('size-exceeded', `invalid file size: ${observedSize}`);
  }
  if (observedSize > maxSize) {
    return reject('size-exceeded', `file too large: ${observedSize} bytes (max: ${maxSize})`);
  }
  return { ok: true };
}

export function quoteShellArg(value: string): string {
  return `'${value.replace(/'/g, "'\\''")}'`;
}

export type RemoteCommand = { ok: true; command: string } | GuardRejection;

function guarded(command: string, allowedVerbs: readonly string[] = DEFAULT_ALLOWED_VERBS): RemoteCommand {
  const check = validateCommand(command, allowedVerbs);
  return check.ok ? { ok: true, command } : check;
}

/**
 * `tail -F` keeps following across remote rotation. `backlogBytes` replays
 * that many trailing bytes before following; `fromByte` (1-based, as `tail`
 * counts) continues at an exact position after a reconnect.
 */
export function buildFollowCommand(
  filePath: string,
  start: { backlogBytes: number } | { fromByte: number }
): RemoteCommand {
  const from = 'backlogBytes' in start
    ? `-c ${Math.max(0, Math.floor(start.backlogBytes))}`
    : `-c +${Math.max(1, Math.floor(start.fromByte))}`;
  return guarded(`tail -F ${from} ${quoteShellArg(filePath)}`);
}

export function buildSizeCommand(filePath: string): RemoteCommand {
  return guarded(`find ${quoteShellArg(filePath)} -maxdepth 0 -type f -printf %s`);
}

export function buildListCommand(directory: string, pattern: string, recursive: boolean): RemoteCommand {
  const depth = recursive ? '' : ' -maxdepth 1';
  return guarded(`find ${quoteShellArg(directory)}${depth} -type f -name ${quoteShellArg(pattern)}`);
}

export function buildTruncateCommand(filePath: string): RemoteCommand {
  return guarded(`truncate -s 0 ${quoteShellArg(filePath)}`, ['truncate']);
}
