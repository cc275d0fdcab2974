/**
 * Shell-escape a string for interpolation into a command line that a shell
 * (or rsync's -e parser) will split. Wraps in single quotes and escapes
 * embedded single quotes.
 *
 * @example shellEscape("foo'bar") => "'foo'\\''bar'"
 * @example shellEscape("normal") => "'normal'"
 */
export function shellEscape(arg: string): string {
  return "'" + arg.replace(/'/g, "'\\''") + "'";
}

/**
 * Quote a path for a remote shell, leaving a leading `~` or `~/` unquoted so the
 * remote shell still expands it to the home directory.
 */
export function shellEscapePath(remotePath: string): string {
  if (remotePath === '~') {
    return remotePath;
  }
  if (remotePath.startsWith('~/')) {
    return '~/' + shellEscape(remotePath.slice(2));
  }
  return shellEscape(remotePath);
}
