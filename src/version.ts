import { readFileSync } from 'node:fs';
import { z } from 'zod';

export type VersionInfo = {
  name: string;
  version: string;
  gitSha: string | null;
  buildTime: string | null;
};

const PackageJsonSchema = z.object({
  name: z.string().catch('tailhub'),
  version: z.string().catch('0.0.0')
});

let cached: VersionInfo | null = null;

function readPackageJson(): { name: string; version: string } {
  const raw = readFileSync(new URL('../package.json', import.meta.url), 'utf8');
  return PackageJsonSchema.parse(JSON.parse(raw));
}

export function getVersionInfo(): VersionInfo {
  if (cached) {
    return cached;
  }

  const pkg = readPackageJson();
  cached = {
    name: pkg.name,
    version: pkg.version,
    gitSha: process.env.BUILD_GIT_SHA ?? null,
    buildTime: process.env.BUILD_TIME ?? null
  };
  return cached;
}
