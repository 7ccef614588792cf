/**
 * Build information, injected through the environment at image build time
 */
import type { Logger } from './Logger.js';

export interface VersionInfo {
  version: string;
  gitCommit: string;
  gitBranch: string;
  buildTime: string;
  nodeVersion: string;
  platform: string;
}

const UNKNOWN = 'unknown';

function read(env: Record<string, string | undefined>, key: string, fallback: string): string {
  const value = env[key]?.trim();
  return value ? value : fallback;
}

/**
 * Release builds report APP_VERSION as is. Development builds with a known
 * commit are named dev-<sha> or, off main/master, dev-<branch>-<sha>.
 */
export function getVersion(env: Record<string, string | undefined> = process.env): string {
  const version = read(env, 'APP_VERSION', 'dev');
  const commit = read(env, 'GIT_COMMIT', UNKNOWN);
  const branch = read(env, 'GIT_BRANCH', UNKNOWN);

  if (version !== 'dev' || commit === UNKNOWN) {
    return version;
  }

  const shortCommit = commit.slice(0, 8);
  if (branch !== UNKNOWN && branch !== 'main' && branch !== 'master') {
    return `dev-${branch}-${shortCommit}`;
  }
  return `dev-${shortCommit}`;
}

export function isDevelopmentBuild(env: Record<string, string | undefined> = process.env): boolean {
  return read(env, 'APP_VERSION', 'dev').includes('dev');
}

export function getVersionInfo(env: Record<string, string | undefined> = process.env): VersionInfo {
  return {
    version: getVersion(env),
    gitCommit: read(env, 'GIT_COMMIT', UNKNOWN),
    gitBranch: read(env, 'GIT_BRANCH', UNKNOWN),
    buildTime: read(env, 'BUILD_TIME', UNKNOWN),
    nodeVersion: process.version,
    platform: `${process.platform}/${process.arch}`,
  };
}

export function logBanner(logger: Logger, info: VersionInfo = getVersionInfo()): void {
  logger.info({ version: info.version }, 'DNSherpa starting');

  if (info.version.includes('dev')) {
    logger.info(
      { commit: info.gitCommit, branch: info.gitBranch, buildTime: info.buildTime },
      'Development build'
    );
  }
  logger.debug({ node: info.nodeVersion, platform: info.platform }, 'Runtime');
}
