import { z } from 'zod';
import { idSchema } from '../../utils/validators.js';

export const IdParamsSchema = z.object({
  id: idSchema,
});

export type IdParams = z.infer<typeof IdParamsSchema>;
