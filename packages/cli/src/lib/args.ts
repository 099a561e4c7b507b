/**
 * Argument parsing shared by the sub-commands.
 */

export interface ParsedArgs {
  /** `--key value` pairs; bare flags are `true` */
  flags: Record<string, string | boolean>
  positionalArgs: string[]
}

/**
 * Parse `--key value`, `--key=value` and bare `--flag` arguments.
 * `-h` is read as `--help`. Names in `booleanFlags` never take a value.
 */
export function parseCliArgs(argv: readonly string[], booleanFlags: readonly string[] = []): ParsedArgs {
  const flags: Record<string, string | boolean> = {}
  const positionalArgs: string[] = []

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (arg === undefined) continue

    if (arg === '-h') {
      flags.help = true
    } else if (arg.startsWith('--')) {
      const body = arg.slice(2)
      const eq = body.indexOf('=')
      if (eq !== -1) {
        flags[body.slice(0, eq)] = body.slice(eq + 1)
        continue
      }
      const value = argv[i + 1]
      if (!booleanFlags.includes(body) && value !== undefined && !value.startsWith('--')) {
        flags[body] = value
        i++
      } else {
        flags[body] = true
      }
    } else {
      positionalArgs.push(arg)
    }
  }

  return { flags, positionalArgs }
}

/**
 * String value of a flag; undefined when absent or given without a value.
 */
export function stringFlag(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags[name]
  return typeof value === 'string' ? value : undefined
}

export function booleanFlag(args: ParsedArgs, name: string): boolean {
  const value = args.flags[name]
  return value === true || value === 'true'
}
