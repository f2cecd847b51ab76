import { z } from 'zod';
import {
  emailSchema,
  idSchema,
  passwordSchema,
  personNameSchema,
} from '../../utils/validators.js';

export const RegisterUserSchema = z
  .object({
    email: emailSchema,
    firstName: personNameSchema,
    lastName: personNameSchema,
    password: passwordSchema,
  })
  .strict();

export type RegisterUserBody = z.infer<typeof RegisterUserSchema>;

export const UpdateUserSchema = z
  .object({
    email: emailSchema.optional(),
    firstName: personNameSchema.optional(),
    lastName: personNameSchema.optional(),
    password: passwordSchema.optional(),
    roleId: idSchema.optional(),
  })
  .strict();

export type UpdateUserBody = z.infer<typeof UpdateUserSchema>;

export const UserQuerySchema = z
  .object({
    email: emailSchema.optional(),
  })
  .strict();

export type UserQuery = z.infer<typeof UserQuerySchema>;
