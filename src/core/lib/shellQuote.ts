/**
 * Quoting for commands handed to the authorization primitive.
 *
 * `do shell script` runs its string through /bin/sh, so each argument is
 * shell-quoted first and the whole line is then escaped as an AppleScript
 * string literal.
 */

const SAFE_WORD = /^[A-Za-z0-9_\/.,:=+@%-]+$/

export const shellQuote = (word: string): string =>
  word.length > 0 && SAFE_WORD.test(word) ? word : `'${word.replace(/'/g, `'\\''`)}'`

export const shellCommandLine = (path: string, args: ReadonlyArray<string>): string =>
  [path, ...args].map(shellQuote).join(" ")

export const appleScriptString = (text: string): string =>
  `"${text.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`

export const administratorScript = (path: string, args: ReadonlyArray<string>): string =>
  `do shell script ${appleScriptString(shellCommandLine(path, args))} with administrator privileges`
