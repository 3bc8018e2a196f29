import { CommandEntry, ExecutionStep } from '@stepforge/shared';
import { FormatError } from '../errors/translation.errors';

const AUTOMATION_PREFIXES = ['mouse.', 'keyboard.', 'clipboard.'] as const;
const WAIT_PATTERN = /^WAIT\(([0-9]*\.?[0-9]+)\)$/i;

/**
 * Maps one command string onto the record an executor runs.
 */
export function toStep(command: string): ExecutionStep {
  const trimmed = command.trim();
  if (!trimmed) {
    throw new FormatError('Command must not be empty');
  }

  const upper = trimmed.toUpperCase();
  if (upper === 'DONE' || upper === 'FAIL') {
    return { type: 'sleep', parameters: { seconds: 0 } };
  }

  const waitMatch = WAIT_PATTERN.exec(trimmed);
  if (waitMatch) {
    return { type: 'sleep', parameters: { seconds: Number(waitMatch[1]) } };
  }

  if (AUTOMATION_PREFIXES.some((prefix) => trimmed.startsWith(prefix))) {
    return { type: 'automation', parameters: { code: trimmed } };
  }

  return { type: 'shell', parameters: { command: trimmed } };
}

export function toSteps(entries: readonly CommandEntry[]): ExecutionStep[] {
  return entries.map((entry) => toStep(entry.command));
}
