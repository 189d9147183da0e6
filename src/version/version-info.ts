// File overview:
// - Purpose: Version and build metadata for GET /version, the startup log and `--version`.
// - Sources: name/version from the nearest package.json; build fields from DEPLOY_TAG, BUILD_TIME, GIT_BRANCH, GIT_COMMIT.
import * as fs from 'fs';
import * as path from 'path';
import { ApiProperty } from '@nestjs/swagger';

const UNKNOWN = 'unknown';

export class VersionInfo {
  @ApiProperty({ example: 'item-api' })
  name!: string;

  @ApiProperty({ example: '1.0.0' })
  version!: string;

  @ApiProperty({ example: '2024.02.14-100' })
  deploy_tag!: string;

  @ApiProperty({ example: '2024-02-14_14:42:35' })
  build_time!: string;

  @ApiProperty({ example: 'main' })
  branch!: string;

  @ApiProperty({ example: 'ee9ec805f61944653a56a7e429b2fad03232be49' })
  commit!: string;

  @ApiProperty({ example: 'v20.11.1' })
  node_version!: string;
}

interface PackageManifest {
  name: string;
  version: string;
}

function readManifest(file: string): PackageManifest | undefined {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
    if (typeof parsed !== 'object' || parsed === null) return undefined;
    const name = 'name' in parsed && typeof parsed.name === 'string' ? parsed.name : UNKNOWN;
    const version = 'version' in parsed && typeof parsed.version === 'string' ? parsed.version : UNKNOWN;
    return { name, version };
  } catch {
    return undefined;
  }
}

/** Walk up from `start` to the first package.json. */
export function findPackageManifest(start: string = __dirname): PackageManifest {
  let dir = start;
  for (;;) {
    const candidate = path.join(dir, 'package.json');
    if (fs.existsSync(candidate)) {
      const manifest = readManifest(candidate);
      if (manifest) return manifest;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return { name: UNKNOWN, version: UNKNOWN };
    dir = parent;
  }
}

export function buildVersionInfo(env: NodeJS.ProcessEnv = process.env): VersionInfo {
  const manifest = findPackageManifest();
  return {
    name: manifest.name,
    version: manifest.version,
    deploy_tag: env.DEPLOY_TAG || UNKNOWN,
    build_time: env.BUILD_TIME || UNKNOWN,
    branch: env.GIT_BRANCH || UNKNOWN,
    commit: env.GIT_COMMIT || UNKNOWN,
    node_version: process.version,
  };
}

let cached: VersionInfo | undefined;

export function getVersionInfo(): VersionInfo {
  cached ??= buildVersionInfo();
  return cached;
}

/** Single-line form printed by `--version`. */
export function versionLine(info: VersionInfo = getVersionInfo()): string {
  return `${info.name} ${info.version} ${info.build_time} ${info.branch} ${info.commit}`;
}

/** Multi-line form for the local startup log. */
export function versionInfoPretty(info: VersionInfo = getVersionInfo()): string {
  return [
    'Version information:',
    `  name: ${info.name}`,
    `  version: ${info.version}`,
    `  build time: ${info.build_time}`,
    `  branch: ${info.branch}`,
    `  commit: ${info.commit}`,
    `  node version: ${info.node_version}`,
  ].join('\n');
}
