/**
 * Read the options of one section of an INI-style file.
 *
 * Option names are upper-cased so lookups are case-insensitive. Both `=` and
 * `:` separate names from values; lines starting with `#` or `;` are comments.
 *
 * @param content - File content.
 * @param section - Section name, matched exactly.
 * @returns Options of the section (empty when the section is absent).
 */
export function readIniSection(
  content: string,
  section: string,
): Record<string, string> {
  let options: Record<string, string> = {}
  let current: string | null = null

  for (let rawLine of content.split(/\r?\n/u)) {
    let line = rawLine.trim()
    if (line === '' || line.startsWith('#') || line.startsWith(';')) {
      continue
    }

    let sectionMatch = line.match(/^\[(?<name>[^\]]+)\]$/u)
    if (sectionMatch) {
      current = sectionMatch.groups?.['name']?.trim() ?? null
      continue
    }

    if (current !== section) {
      continue
    }

    let optionMatch = line.match(/^(?<key>[^:=\s]+)\s*[:=]\s*(?<value>.*)$/u)
    let key = optionMatch?.groups?.['key']
    if (key) {
      options[key.toUpperCase()] = optionMatch?.groups?.['value']?.trim() ?? ''
    }
  }

  return options
}
