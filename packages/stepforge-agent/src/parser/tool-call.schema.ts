import { z } from 'zod';

export const toolCallArgumentsSchema = z.record(z.unknown());

export type ToolCallArguments = z.infer<typeof toolCallArgumentsSchema>;

// `arguments` arrives either as an object or as a JSON-encoded string.
export const toolCallEnvelopeSchema = z.object({
  name: z.string().optional(),
  arguments: z.union([z.string(), toolCallArgumentsSchema]),
});

export type ToolCallEnvelope = z.infer<typeof toolCallEnvelopeSchema>;

export const COMPUTER_USE_TOOL = 'computer_use';
