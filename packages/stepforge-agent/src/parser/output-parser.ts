import { ParserMode, Step } from '@stepforge/shared';
import { parseTaggedOutput } from './tagged.parser';
import { parseToolCallOutput } from './tool-call.parser';

const TAGGED_MARKERS = ['<|action_start|>', '<|think_start|>'];

function isProductive(step: Step): boolean {
  return step.actions.length > 0 || step.reason.length > 0;
}

/**
 * Parses raw model output into a Step using the tagged grammar, the
 * tool-call grammar, or whichever of the two the text looks like.
 */
export function parseOutput(raw: string, mode: ParserMode = 'auto'): Step {
  switch (mode) {
    case 'tagged':
      return parseTaggedOutput(raw);
    case 'tool-call':
      return parseToolCallOutput(raw);
    case 'auto':
      return parseAuto(raw);
  }
}

function parseAuto(raw: string): Step {
  if (raw.includes('<tool_call>')) {
    const step = parseToolCallOutput(raw);
    if (isProductive(step)) {
      return step;
    }
  }
  if (TAGGED_MARKERS.some((marker) => raw.includes(marker))) {
    return parseTaggedOutput(raw);
  }
  const step = parseToolCallOutput(raw);
  return isProductive(step) ? step : parseTaggedOutput(raw);
}
