import { z } from 'zod';
import { emailSchema } from '../../utils/validators.js';

export const LoginSchema = z
  .object({
    email: emailSchema,
    password: z.string(),
  })
  .strict();

export type LoginInput = z.infer<typeof LoginSchema>;
