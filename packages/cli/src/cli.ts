import { Command, CommanderError, InvalidArgumentError } from 'commander'
import {
  PRESET_NAMES,
  ReplayScriptError,
  createPresetState,
  formatStep,
  keysToActions,
  loadReplayScript,
  replay,
  replayScript,
  type PresetName,
  type ReplayStep,
} from './replay.js'

export interface CliOptions {
  /** YAML edit script to replay instead of keys */
  script?: string
  /** Initial buffer contents */
  initial?: string
  /** Print the trace as JSON */
  json?: boolean
  /** Log rejected edits */
  debug?: boolean
}

function parsePreset(value: string): PresetName {
  const preset = PRESET_NAMES.find((name) => name === value)
  if (!preset) {
    throw new InvalidArgumentError(`Expected one of: ${PRESET_NAMES.join(', ')}.`)
  }
  return preset
}

export function createProgram(): Command {
  return new Command('typedtext')
    .description('Replay edits against a typed text input and print what it accepts')
    .argument('[preset]', `input preset (${PRESET_NAMES.join(', ')})`, parsePreset)
    .argument('[keys...]', 'keys typed at the end of the buffer; <bs> deletes, <clear> empties')
    .option('-s, --script <file>', 'replay a YAML edit script')
    .option('-i, --initial <text>', 'initial buffer contents')
    .option('--json', 'print the trace as JSON')
    .option('--debug', 'log rejected edits')
    .configureOutput({
      writeOut: (str) => console.log(str.trimEnd()),
      writeErr: (str) => console.error(str.trimEnd()),
    })
}

async function collectSteps(
  preset: PresetName | undefined,
  keys: string[],
  options: CliOptions
): Promise<ReplayStep[]> {
  if (options.script) {
    if (preset) {
      throw new ReplayScriptError('Pass either a preset with keys or --script, not both')
    }
    const script = await loadReplayScript(options.script)
    return replayScript(script, { initialText: options.initial, debug: options.debug })
  }
  if (!preset) {
    throw new ReplayScriptError('Missing preset. Run `typedtext --help` for usage.')
  }
  const target = createPresetState(preset, { initialText: options.initial, debug: options.debug })
  return replay(target, keysToActions(keys))
}

async function execute(
  preset: PresetName | undefined,
  keys: string[],
  options: CliOptions
): Promise<number> {
  let steps: ReplayStep[]
  try {
    steps = await collectSteps(preset, keys, options)
  } catch (err) {
    if (err instanceof ReplayScriptError) {
      console.error(`[typedtext] ${err.message}`)
      return 1
    }
    throw err
  }

  if (options.json) {
    console.log(JSON.stringify(steps, null, 2))
  } else {
    for (const step of steps) {
      console.log(formatStep(step))
    }
  }
  return 0
}

/**
 * Run the CLI with user arguments (no node/script prefix).
 * @returns the process exit code
 */
export async function runCli(argv: readonly string[]): Promise<number> {
  let exitCode = 0
  const program = createProgram()
    .exitOverride()
    .action(async (preset: PresetName | undefined, keys: string[] | undefined, options: CliOptions) => {
      exitCode = await execute(preset, keys ?? [], options)
    })

  try {
    await program.parseAsync([...argv], { from: 'user' })
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode
    }
    throw err
  }
  return exitCode
}
