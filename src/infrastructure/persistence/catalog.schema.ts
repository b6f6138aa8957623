import { z } from 'zod';

import {
  CourtStatus,
  DEFAULT_SLOT_DURATION_MINUTES,
} from '../../domain/model/court';
import { parseRole } from '../../domain/model/user';

const WALL_CLOCK_TIME = /^([01]\d|2[0-3]):[0-5]\d$/;

export const CourtSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    status: z.nativeEnum(CourtStatus).default(CourtStatus.ACTIVE),
    openingTime: z.string().regex(WALL_CLOCK_TIME, 'Expected HH:mm'),
    closingTime: z.string().regex(WALL_CLOCK_TIME, 'Expected HH:mm'),
    slotDurationMinutes: z
      .number()
      .int()
      .positive()
      .default(DEFAULT_SLOT_DURATION_MINUTES),
    basePrice: z.number().nonnegative(),
    memberPrice: z.number().nonnegative(),
  })
  .refine((court) => court.openingTime < court.closingTime, {
    message: 'openingTime must be before closingTime',
    path: ['closingTime'],
  });

export const UserSchema = z.object({
  id: z.string().min(1),
  role: z.string().transform((value, ctx) => {
    const role = parseRole(value);
    if (!role.ok) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unknown role ${value}`,
      });
      return z.NEVER;
    }
    return role.value;
  }),
});

export const CatalogSeedSchema = z.object({
  courts: z.array(CourtSchema).default([]),
  users: z.array(UserSchema).default([]),
});

export type CourtInput = z.input<typeof CourtSchema>;
export type UserInput = z.input<typeof UserSchema>;
