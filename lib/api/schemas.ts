/**
 * API Request Validation Schemas
 *
 * Zod schemas for the webhook and check endpoints.
 */

import { z } from 'zod';
import { BadRequestError, ErrorCode } from './errors';

// ============================================================================
// Telegram Update Schemas
// ============================================================================

/**
 * Message entity; only link-bearing types are used downstream
 */
export const messageEntitySchema = z
  .object({
    type: z.string(),
    offset: z.number().int().nonnegative(),
    length: z.number().int().nonnegative(),
    url: z.string().optional(),
  })
  .passthrough();

export const chatSchema = z
  .object({
    id: z.number().int(),
    type: z.string(),
  })
  .passthrough();

export const userSchema = z
  .object({
    id: z.number().int(),
    is_bot: z.boolean().optional(),
    username: z.string().optional(),
  })
  .passthrough();

export const messageSchema = z
  .object({
    message_id: z.number().int(),
    chat: chatSchema,
    from: userSchema.optional(),
    date: z.number().int(),
    text: z.string().optional(),
    caption: z.string().optional(),
    entities: z.array(messageEntitySchema).optional(),
    caption_entities: z.array(messageEntitySchema).optional(),
  })
  .passthrough();

/**
 * Incoming update (webhook body or one getUpdates item)
 */
export const updateSchema = z
  .object({
    update_id: z.number().int(),
    message: messageSchema.optional(),
  })
  .passthrough();

export type MessageEntity = z.infer<typeof messageEntitySchema>;
export type TelegramMessage = z.infer<typeof messageSchema>;
export type TelegramUpdate = z.infer<typeof updateSchema>;

// ============================================================================
// Check Endpoint
// ============================================================================

export const checkRequestSchema = z.object({
  url: z.string().trim().min(1, 'URL is required').max(2048, 'URL too long'),
});

export type CheckRequest = z.infer<typeof checkRequestSchema>;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Validate request body against a schema
 * @throws BadRequestError with field details if invalid
 */
export function validateBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const result = schema.safeParse(body);

  if (!result.success) {
    const fields = result.error.errors.map((e) => ({
      field: e.path.join('.'),
      message: e.message,
    }));

    throw new BadRequestError('Validation failed', fields, ErrorCode.VALIDATION_ERROR);
  }

  return result.data;
}
