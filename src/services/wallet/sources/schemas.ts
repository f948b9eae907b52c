import { z } from 'zod';

// Balance endpoints answer with a JSON object, list endpoints with a JSON array.
export const accountPayloadSchema = z.record(z.unknown());

export const listPayloadSchema = z.array(z.unknown());

export type AccountPayload = z.infer<typeof accountPayloadSchema>;
export type ListPayload = z.infer<typeof listPayloadSchema>;
