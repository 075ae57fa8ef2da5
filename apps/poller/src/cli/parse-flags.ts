/**
 * Command line arguments of the poller CLI. `check` reads the value flags,
 * `run` takes none.
 */
export interface CliArgs {
  region: string
  name: string
  filters: string[]
  help: boolean
  /** Flags this CLI does not know, without leading dashes */
  unknown: string[]
}

const VALUE_FLAGS = ['region', 'name', 'filters'] as const
type ValueFlag = (typeof VALUE_FLAGS)[number]

function isValueFlag(key: string): key is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === key)
}

/**
 * Split a comma-separated value, dropping blanks.
 */
export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
}

/**
 * Parse `--flag value` and `--flag=value`. Tokens up to the next flag belong
 * to the value, so an unquoted instance name like `P2000 Utrecht` survives.
 * Tokens before the first flag are ignored.
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const values: Record<ValueFlag, string[]> = { region: [], name: [], filters: [] }
  const unknown: string[] = []
  let help = false
  let current: ValueFlag | null = null

  for (const token of argv) {
    if (token === '--help' || token === '-h') {
      help = true
      current = null
      continue
    }

    if (!token.startsWith('--')) {
      if (current) values[current].push(token)
      continue
    }

    const [key, inline] = splitAssignment(token.slice(2))
    if (!isValueFlag(key)) {
      unknown.push(key)
      current = null
      continue
    }

    values[key] = inline === undefined ? [] : [inline]
    current = key
  }

  return {
    region: values.region.join(' ').trim(),
    name: values.name.join(' ').trim(),
    filters: splitList(values.filters.join(' ')),
    help,
    unknown,
  }
}

function splitAssignment(flag: string): [string, string | undefined] {
  const index = flag.indexOf('=')
  return index === -1 ? [flag, undefined] : [flag.slice(0, index), flag.slice(index + 1)]
}
