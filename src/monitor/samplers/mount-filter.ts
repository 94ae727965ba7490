/**
 * Mount Filter
 *
 * Decides which mounts appear in the disk table. Pure over mount metadata
 * and re-evaluated every tick since mounts come and go.
 */

import type { MountFilterOptions, MountInfo } from '../types/index.js';

export const VIRTUAL_FILESYSTEMS: ReadonlySet<string> = new Set([
  'tmpfs',
  'devtmpfs',
  'sysfs',
  'proc',
  'cgroup',
  'cgroup2',
  'devpts',
  'securityfs',
  'pstore',
  'efivarfs',
  'bpf',
  'configfs',
  'debugfs',
  'tracefs',
  'fusectl',
  'mqueue',
  'hugetlbfs',
  'squashfs',
  'autofs',
  'binfmt_misc',
  'ramfs',
]);

const SYSTEM_MOUNT_PREFIXES = ['/sys', '/proc', '/dev', '/run', '/boot/efi'];

export const LOOP_DEVICE_PATTERN = /^\/dev\/loop\d*/;

function isUnder(mountPoint: string, prefix: string): boolean {
  return mountPoint === prefix || mountPoint.startsWith(`${prefix}/`);
}

export function isLoopDevice(mount: MountInfo): boolean {
  return LOOP_DEVICE_PATTERN.test(mount.device);
}

export function isSnapMount(mount: MountInfo): boolean {
  return (
    mount.device.startsWith('/dev/snap') ||
    isUnder(mount.mountPoint, '/snap') ||
    isUnder(mount.mountPoint, '/var/snap')
  );
}

export function isVirtualMount(mount: MountInfo): boolean {
  return (
    VIRTUAL_FILESYSTEMS.has(mount.fsType) ||
    SYSTEM_MOUNT_PREFIXES.some(prefix => isUnder(mount.mountPoint, prefix))
  );
}

export function shouldDisplayMount(mount: MountInfo, filters: MountFilterOptions): boolean {
  if (filters.excludeLoopDevices && isLoopDevice(mount)) return false;
  if (filters.excludeSnapMounts && isSnapMount(mount)) return false;
  if (filters.excludeVirtualFilesystems && isVirtualMount(mount)) return false;
  return true;
}

export function filterMounts<T extends MountInfo>(mounts: readonly T[], filters: MountFilterOptions): T[] {
  return mounts.filter(mount => shouldDisplayMount(mount, filters));
}
