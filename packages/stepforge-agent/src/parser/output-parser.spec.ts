import { ActionType } from '@stepforge/shared';
import { parseOutput } from './output-parser';

const TOOL_CALL =
  '<tool_call>{"name":"computer_use","arguments":{"action":"left_click","coordinate":[500,300]}}</tool_call>';
const TAGGED = '<|action_start|>left_triple(5, 6)<|action_end|>';

describe('parseOutput', () => {
  it('prefers the tool-call grammar when tool calls are present', () => {
    expect(parseOutput(TOOL_CALL).actions[0].type).toBe(ActionType.Click);
  });

  it('uses the tagged grammar when tagged markers are present', () => {
    expect(parseOutput(TAGGED).actions[0].type).toBe(ActionType.TripleClick);
  });

  it('falls through to tagged parsing when a tool call is unproductive', () => {
    const raw = `<tool_call>oops</tool_call>${TAGGED}`;

    expect(parseOutput(raw).actions[0].type).toBe(ActionType.TripleClick);
  });

  it('picks up a bare Action summary without any markers', () => {
    expect(parseOutput('Action: nothing to do yet').reason).toBe(
      'nothing to do yet',
    );
  });

  it('returns an empty step for unrecognised text', () => {
    expect(parseOutput('hello')).toEqual({
      reason: '',
      actions: [],
      stop: false,
    });
  });

  it('honours an explicit mode', () => {
    expect(parseOutput(TOOL_CALL, 'tagged').actions).toEqual([]);
    expect(parseOutput(TAGGED, 'tool-call').actions).toEqual([]);
  });
});
