/**
 * User Entity
 *
 * Someone who creates foods and votes on them.
 * The password is accepted on create/update and stored only as a hash;
 * the hash never appears in the public shape.
 */

import { z } from "zod";
import { defineEntity } from "@foodvote/contracts";

/** Public shape returned by the API */
export const UserSchema = z.object({
  id: z.number().int(),
  username: z.string(),
  email: z.string(),
});

/** Stored shape: the public fields plus the password hash */
export const UserRecordSchema = UserSchema.extend({
  hashedPassword: z.string(),
});

export const UserCreateSchema = z.object({
  username: z.string().trim().min(1).max(64),
  email: z.string().trim().email(),
  password: z.string().min(8),
});

export const UserUpdateSchema = UserCreateSchema.partial();

export type User = z.infer<typeof UserSchema>;
export type UserRecord = z.infer<typeof UserRecordSchema>;
export type UserCreate = z.infer<typeof UserCreateSchema>;
export type UserUpdate = z.infer<typeof UserUpdateSchema>;

export const UserEntity = defineEntity({
  name: "User",
  label: "User",
  pluralName: "users",
  description:
    "A person using the app. Usernames and emails are unique across all users.",
  createSchema: UserCreateSchema,
  updateSchema: UserUpdateSchema,
  readSchema: UserSchema,
});
