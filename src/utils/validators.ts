// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import { z } from 'zod';
import { Messages } from './messages.js';

export const emailSchema = z.string().trim().max(255).email(Messages.INVALID_EMAIL);

export const idSchema = z.coerce.number().int().positive().max(2_147_483_647);

export const personNameSchema = z
  .string()
  .min(1)
  .max(100)
  .regex(/^[A-Za-zА-Яа-яЁё-]+$/, Messages.INVALID_NAME);

export const passwordSchema = z
  .string()
  .min(8, Messages.WEAK_PASSWORD)
  .max(100, Messages.WEAK_PASSWORD)
  .regex(/[A-Z]/, Messages.WEAK_PASSWORD)
  .regex(/[a-z]/, Messages.WEAK_PASSWORD)
  .regex(/\d/, Messages.WEAK_PASSWORD);

export function isValidEmail(value: string): boolean {
  return emailSchema.safeParse(value).success;
}
