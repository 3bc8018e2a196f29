import {
  CURSOR_ACTION_KINDS,
  PIXEL_ACTION_KINDS,
  WEB_ACTION_KINDS,
} from '@stepforge/shared';
import { z } from 'zod';

// Dialect payloads as the HTTP surface accepts them.
const pointSchema = z.tuple([z.number(), z.number()]);

export const pixelActionSchema = z.object({
  action: z.enum(PIXEL_ACTION_KINDS),
  coordinate: pointSchema.optional(),
  startCoordinate: pointSchema.optional(),
  text: z.string().optional(),
  scrollDirection: z.string().optional(),
  scrollAmount: z.number().int().optional(),
  duration: z.number().nonnegative().optional(),
});

export const webActionSchema = z.object({
  action: z.enum(WEB_ACTION_KINDS),
  x: z.number().optional(),
  y: z.number().optional(),
  text: z.string().optional(),
  pressEnter: z.boolean().optional(),
  clearBeforeTyping: z.boolean().optional(),
  direction: z.string().optional(),
  magnitude: z.number().nonnegative().optional(),
  destinationX: z.number().optional(),
  destinationY: z.number().optional(),
  keys: z.string().optional(),
  url: z.string().optional(),
});

export const cursorActionSchema = z.object({
  action: z.enum(CURSOR_ACTION_KINDS),
  coordinate: z.array(z.number()).optional(),
  text: z.string().optional(),
  keys: z.array(z.string()).optional(),
  pixels: z.number().optional(),
  time: z.number().nonnegative().optional(),
  status: z.enum(['success', 'failure']).optional(),
});
