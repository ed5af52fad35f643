/**
 * Zod Schemas for Bitbucket REST payloads
 */

import { z } from 'zod';

export const BitbucketLinkSchema = z.object({ href: z.string() }).passthrough();

export const BitbucketCloneLinkSchema = z
  .object({
    name: z.string(),
    href: z.string()
  })
  .passthrough();

export const BitbucketRepositorySchema = z
  .object({
    full_name: z.string(),
    name: z.string(),
    description: z.string().nullable().default(null),
    is_private: z.boolean(),
    scm: z.string(),
    links: z
      .object({
        html: BitbucketLinkSchema,
        avatar: BitbucketLinkSchema.optional(),
        clone: z.array(BitbucketCloneLinkSchema)
      })
      .passthrough()
      .refine(
        (links) => ['ssh', 'https'].every((name) => links.clone.some((link) => link.name === name)),
        { message: 'clone links must include ssh and https', path: ['clone'] }
      )
  })
  .passthrough();

export type BitbucketRepositoryPayload = z.infer<typeof BitbucketRepositorySchema>;

/** One page of a 2.0 list endpoint. */
export const BitbucketPageSchema = z
  .object({
    values: z.array(z.unknown()),
    next: z.string().optional()
  })
  .passthrough();

/** `GET /1.0/user/privileges/`: team name to privilege. */
export const BitbucketPrivilegesSchema = z
  .object({
    teams: z.record(z.string(), z.unknown())
  })
  .passthrough();
