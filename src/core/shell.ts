/**
 * Quotes a value for a POSIX shell. Plain words are left as they are.
 */
export function shellQuote(value: string): string {
  if (/^[\w@%+=:,./-]+$/.test(value)) {
    return value
  }

  return `'${value.replaceAll('\'', '\'\\\'\'')}'`
}

export function shellJoin(argv: string[]): string {
  return argv.map(arg => shellQuote(arg)).join(' ')
}
