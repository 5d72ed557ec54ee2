/**
 * Whether the process runs with root privileges. Platforms without POSIX
 * user ids never count as elevated.
 */
export function isElevated(): boolean {
  return typeof process.getuid === 'function' && process.getuid() === 0;
}
