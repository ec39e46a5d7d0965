import { exec } from 'child_process';
import os from 'os';
import { promisify } from 'util';
import { pathExists, readText } from '../utils/fs.js';

const execAsync = promisify(exec);

export type OsType = 'macos' | 'linux';
export type Distro = 'ubuntu' | 'arch';
export type PackageManager = 'brew' | 'apt' | 'pacman';

export type Environment = {
  os: OsType | null;
  platform: string;
  architecture: string;
  distro: Distro | null;
  packageManager: PackageManager | null;
  hostname: string;
};

const UBUNTU_FAMILY = new Set(['ubuntu', 'debian', 'pop']);
const ARCH_FAMILY = new Set(['arch', 'manjaro', 'endeavouros']);
const SUPPORTED_ARCHITECTURES = new Set(['x86_64', 'arm64']);

export function normalizeOs(platform: string): OsType | null {
  if (platform === 'darwin') return 'macos';
  if (platform === 'linux') return 'linux';
  return null;
}

export function normalizeArch(arch: string): string {
  const lower = arch.toLowerCase();
  if (lower === 'x64' || lower === 'x86_64' || lower === 'amd64') return 'x86_64';
  if (lower === 'arm64' || lower === 'aarch64') return 'arm64';
  return lower;
}

/**
 * Reads the `ID=` line of an os-release file.
 */
export function parseDistro(osRelease: string): Distro | null {
  for (const line of osRelease.split('\n')) {
    if (!line.startsWith('ID=')) continue;
    const id = line.slice(3).trim().replace(/^"|"$/g, '');
    if (UBUNTU_FAMILY.has(id)) return 'ubuntu';
    if (ARCH_FAMILY.has(id)) return 'arch';
  }
  return null;
}

async function commandExists(command: string): Promise<boolean> {
  try {
    await execAsync(`which ${command}`);
    return true;
  } catch {
    return false;
  }
}

async function detectDistro(): Promise<Distro | null> {
  if (await pathExists('/etc/os-release')) {
    const distro = parseDistro(await readText('/etc/os-release'));
    if (distro) return distro;
  }
  if (await pathExists('/etc/arch-release')) return 'arch';
  if (await pathExists('/etc/debian_version')) return 'ubuntu';
  return null;
}

async function detectPackageManager(osType: OsType | null, distro: Distro | null): Promise<PackageManager | null> {
  if (osType === 'macos') {
    return (await commandExists('brew')) ? 'brew' : null;
  }
  if (distro === 'ubuntu' && (await commandExists('apt'))) return 'apt';
  if (distro === 'arch' && (await commandExists('pacman'))) return 'pacman';
  return null;
}

export async function detectEnvironment(): Promise<Environment> {
  const platform = process.platform;
  const osType = normalizeOs(platform);
  const distro = osType === 'linux' ? await detectDistro() : null;

  return {
    os: osType,
    platform,
    architecture: normalizeArch(os.arch()),
    distro,
    packageManager: await detectPackageManager(osType, distro),
    hostname: os.hostname(),
  };
}

/**
 * One-line summary, e.g. `linux (ubuntu) x86_64, apt, on workstation`.
 */
export function describeEnvironment(env: Environment): string {
  const osName = env.os ?? env.platform;
  const distro = env.distro ? ` (${env.distro})` : '';
  const manager = env.packageManager ?? 'no package manager';
  return `${osName}${distro} ${env.architecture}, ${manager}, on ${env.hostname}`;
}

export function isSupported(env: Environment): { supported: boolean; reason: string } {
  if (env.os === null) {
    return { supported: false, reason: `Unsupported OS: ${env.platform}` };
  }
  if (env.os === 'linux' && env.distro === null) {
    return { supported: false, reason: 'Unsupported Linux distro' };
  }
  if (!SUPPORTED_ARCHITECTURES.has(env.architecture)) {
    return { supported: false, reason: `Unsupported architecture: ${env.architecture}` };
  }
  if (env.packageManager === null) {
    return { supported: false, reason: 'No supported package manager found' };
  }
  return { supported: true, reason: 'System is supported' };
}

/**
 * Base profile file for an OS, e.g. `linux.yml`.
 */
export function getProfileName(osType: OsType): string {
  return `${osType}.yml`;
}
