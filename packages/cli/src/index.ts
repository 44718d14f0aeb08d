/**
 * @typedtext/cli
 *
 * Replays keystrokes or YAML edit scripts against the built-in typed text
 * presets and prints what each edit did to the buffer.
 *
 * @packageDocumentation
 */

export { createProgram, runCli, type CliOptions } from './cli.js'

export {
  PRESET_NAMES,
  ReplayActionSchema,
  ReplayScriptSchema,
  ReplayScriptError,
  createPresetState,
  formatStep,
  keysToActions,
  loadReplayScript,
  parseReplayScript,
  replay,
  replayScript,
  type PresetName,
  type PresetOptions,
  type ReplayAction,
  type ReplayScript,
  type ReplayStep,
  type ReplayTarget,
} from './replay.js'
