/**
 * Speech Module - Barrel Export
 */

export {
  CommandSpeaker,
  silentSpeaker,
  runShellCommand,
  type Speaker,
  type RunCommand,
} from './speaker';
