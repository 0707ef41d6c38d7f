import { z } from 'zod';
import { USERNAME_MAX_LENGTH, USERNAME_PATTERN } from './auth.constants';

export const usernameSchema = z
  .string()
  .trim()
  .min(1, 'Username is required.')
  .max(USERNAME_MAX_LENGTH)
  .regex(USERNAME_PATTERN, 'Username may contain only letters, numbers, and @/./+/-/_ characters.');

export const personNameSchema = z.string().trim().max(150).optional().default('');

export const optionalEmailSchema = z
  .union([z.literal(''), z.string().trim().email().max(254)])
  .optional()
  .default('');
