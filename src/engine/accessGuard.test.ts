import { mkdirSync, mkdtempSync, realpathSync, rmSync, symlinkSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import {
  buildFollowCommand,
  buildListCommand,
  buildSizeCommand,
  buildTruncateCommand,
  checkFileSize,
  quoteShellArg,
  validateCommand,
  validatePath
} from './accessGuard.js';

describe('validatePath', () => {
  it('rejects parent-directory traversal before normalizing', () => {
    const result = validatePath('/var/log/app/../../../etc/passwd', ['/var/log'], 'remote');
    expect(result.ok).toBe(false);
    expect(result.ok ? null : result.reason).toBe('path-denylisted');
  });

  it('accepts a path inside an allowed prefix', () => {
    expect(validatePath('/var/log/nginx/access.log', ['/var/log'], 'remote')).toEqual({
      ok: true,
      normalizedPath: '/var/log/nginx/access.log'
    });
  });

  it('accepts the prefix itself', () => {
    expect(validatePath('/var/log', ['/var/log/'], 'remote')).toEqual({ ok: true, normalizedPath: '/var/log' });
  });

  it('matches prefixes segment-wise', () => {
    const result = validatePath('/var/logs/app.log', ['/var/log'], 'remote');
    expect(result.ok ? null : result.reason).toBe('path-outside-whitelist');
  });

  it('normalizes redundant separators and dot segments', () => {
    expect(validatePath('/var//log/./app.log', ['/var/log'], 'remote')).toEqual({
      ok: true,
      normalizedPath: '/var/log/app.log'
    });
  });

  it.each([
    ['/etc/shadow', ['/etc']],
    ['/etc/passwd', ['/etc']],
    ['/etc/sudoers.d/admins', ['/etc']],
    ['/home/ops/.ssh/id_ed25519', ['/home']],
    ['/srv/tls/server.pem', ['/srv']],
    ['/srv/tls/server.KEY', ['/srv']],
    ['/proc/self/environ', ['/']]
  ])('denies %s even inside an allowed prefix', (candidate, prefixes) => {
    const result = validatePath(candidate, prefixes, 'remote');
    expect(result.ok ? null : result.reason).toBe('path-denylisted');
  });

  it('rejects everything when the allow-list is empty', () => {
    const result = validatePath('/var/log/app.log', [], 'remote');
    expect(result.ok ? null : result.reason).toBe('path-outside-whitelist');
  });

  it('rejects relative and empty paths', () => {
    expect(validatePath('var/log/app.log', ['/var/log'], 'remote').ok).toBe(false);
    expect(validatePath('   ', ['/var/log'], 'remote').ok).toBe(false);
  });

  describe('local paths', () => {
    let root = '';

    afterEach(() => {
      if (root) {
        rmSync(root, { recursive: true, force: true });
      }
    });

    it('resolves symlinks before checking the prefix', () => {
      root = realpathSync(mkdtempSync(path.join(tmpdir(), 'guard-')));
      const allowed = path.join(root, 'allowed');
      const outside = path.join(root, 'outside');
      mkdirSync(allowed);
      mkdirSync(outside);
      writeFileSync(path.join(outside, 'secret.log'), 'x\n');
      symlinkSync(path.join(outside, 'secret.log'), path.join(allowed, 'link.log'));
      writeFileSync(path.join(allowed, 'real.log'), 'y\n');

      const viaLink = validatePath(path.join(allowed, 'link.log'), [allowed]);
      expect(viaLink.ok ? null : viaLink.reason).toBe('path-outside-whitelist');

      expect(validatePath(path.join(allowed, 'real.log'), [allowed])).toEqual({
        ok: true,
        normalizedPath: path.join(allowed, 'real.log')
      });
    });

    it('falls back to the lexical form for files that do not exist yet', () => {
      root = realpathSync(mkdtempSync(path.join(tmpdir(), 'guard-')));
      expect(validatePath(path.join(root, 'later.log'), [root])).toEqual({
        ok: true,
        normalizedPath: path.join(root, 'later.log')
      });
    });
  });
});

describe('validateCommand', () => {
  it('accepts allowed verbs', () => {
    expect(validateCommand("tail -F -n 0 '/var/log/app.log'")).toEqual({ ok: true });
    expect(validateCommand('ls -d /')).toEqual({ ok: true });
  });

  it.each([
    ['tail -f /var/log/app.log; rm -rf /', ';'],
    ['cat /var/log/app.log | grep error', '|'],
    ['tail -f a.log && reboot', '&'],
    ['cat `whoami`', '`'],
    ['cat $HOME/app.log', '$'],
    ['cat a.log > /tmp/out', '>'],
    ['cat < a.log', '<'],
    ['ls\nreboot', '\n']
  ])('rejects %j for its metacharacter', (command, character) => {
    expect(validateCommand(command)).toEqual({
      ok: false,
      reason: 'command-has-metacharacter',
      message: `command contains ${JSON.stringify(character)}`
    });
  });

  it('checks metacharacters before the verb', () => {
    const result = validateCommand('rm -rf $(pwd)');
    expect(result.ok ? null : result.reason).toBe('command-has-metacharacter');
  });

  it('rejects verbs outside the allow-list', () => {
    expect(validateCommand('rm -rf /tmp/x')).toEqual({
      ok: false,
      reason: 'command-verb-not-allowed',
      message: 'command verb not allowed: rm'
    });
    expect(validateCommand('truncate -s 0 /var/log/a.log', ['truncate'])).toEqual({ ok: true });
  });
});

describe('checkFileSize', () => {
  it('rejects files over the limit', () => {
    const result = checkFileSize(209_715_200, 104_857_600);
    expect(result.ok ? null : result.reason).toBe('size-exceeded');
  });

  it('accepts files within the limit', () => {
    expect(checkFileSize(1024, 104_857_600)).toEqual({ ok: true });
    expect(checkFileSize(104_857_600, 104_857_600)).toEqual({ ok: true });
  });

  it('rejects negative sizes', () => {
    expect(checkFileSize(-1, 10).ok).toBe(false);
  });
});

describe('remote command builders', () => {
  it('quotes single quotes inside arguments', () => {
    expect(quoteShellArg("/var/log/it's.log")).toBe("'/var/log/it'\\''s.log'");
  });

  it('builds follow commands from a byte backlog or a byte position', () => {
    expect(buildFollowCommand('/var/log/app.log', { backlogBytes: 10_240 })).toEqual({
      ok: true,
      command: "tail -F -c 10240 '/var/log/app.log'"
    });
    expect(buildFollowCommand('/var/log/app.log', { fromByte: 4_097 })).toEqual({
      ok: true,
      command: "tail -F -c +4097 '/var/log/app.log'"
    });
  });

  it('refuses paths carrying metacharacters even when quoted', () => {
    const result = buildFollowCommand('/var/log/a;b.log', { fromByte: 1 });
    expect(result.ok ? null : result.reason).toBe('command-has-metacharacter');
  });

  it('builds listing, size and truncate commands', () => {
    expect(buildListCommand('/var/log/nginx', '*.log', false)).toEqual({
      ok: true,
      command: "find '/var/log/nginx' -maxdepth 1 -type f -name '*.log'"
    });
    expect(buildListCommand('/var/log/nginx', '*.log', true)).toEqual({
      ok: true,
      command: "find '/var/log/nginx' -type f -name '*.log'"
    });
    expect(buildSizeCommand('/var/log/app.log')).toEqual({
      ok: true,
      command: "find '/var/log/app.log' -maxdepth 0 -type f -printf %s"
    });
    expect(buildTruncateCommand('/var/log/app.log')).toEqual({
      ok: true,
      command: "truncate -s 0 '/var/log/app.log'"
    });
  });
});
