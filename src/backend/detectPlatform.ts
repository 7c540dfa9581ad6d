export type PlatformInfo = {
  platform: NodeJS.Platform;
  arch: string;
  isWindows: boolean;
  /** `<platform>-<arch>`; part of the compile cache key. */
  tag: string;
};

export function detectPlatform(platform: NodeJS.Platform = process.platform, arch: string = process.arch): PlatformInfo {
  return { platform, arch, isWindows: platform === 'win32', tag: `${platform}-${arch}` };
}
