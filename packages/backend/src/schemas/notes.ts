import { z } from 'zod';

const MAX_SERIAL_ID = 2_147_483_647;

const serial_id = z.coerce.number().int().positive().max(MAX_SERIAL_ID);

// Accepts a JSON number or a decimal string; BIGINT column, JS safe range
const user_id = z
  .union([z.number(), z.string().regex(/^-?\d+$/).transform(Number)])
  .pipe(z.number().int().safe());

// Note id path param
export const note_id_param_schema = z.object({
  id: serial_id,
});

// Create note
export const create_note_schema = z.object({
  userId: user_id,
  title: z.string().default(''),
  content: z.string().default(''),
  isPinned: z.boolean().default(false),
});

// Update note (full replacement of the editable fields)
export const update_note_schema = z.object({
  title: z.string(),
  content: z.string(),
  isPinned: z.boolean().default(false),
});

// Toggle pin
export const toggle_pin_schema = z.object({
  isPinned: z.boolean(),
});

// Delete attachment
export const delete_attachment_schema = z.object({
  attachmentId: serial_id,
});

export type NoteIdParam = z.infer<typeof note_id_param_schema>;
export type CreateNoteInput = z.infer<typeof create_note_schema>;
export type UpdateNoteInput = z.infer<typeof update_note_schema>;
export type TogglePinInput = z.infer<typeof toggle_pin_schema>;
export type DeleteAttachmentInput = z.infer<typeof delete_attachment_schema>;
