/**
 * POSIX shell quoting for arguments that end up inside `sh -c` strings
 * (container exec, remote exec).
 */
export function escapeShellArg(arg: string): string {
  return `'${arg.replace(/'/g, "'\\''")}'`;
}
