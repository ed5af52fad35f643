/**
 * Zod Schemas for GitHub REST payloads
 *
 * Only the fields the sync reads are declared; everything else passes
 * through so the raw JSON can be stored alongside the record.
 */

import { z } from 'zod';

// ============================================================================
// Repositories
// ============================================================================

export const GitHubRepositorySchema = z
  .object({
    id: z.number(),
    name: z.string(),
    full_name: z.string(),
    description: z.string().nullable().default(null),
    private: z.boolean(),
    ssh_url: z.string(),
    clone_url: z.string(),
    html_url: z.string(),
    owner: z
      .object({
        login: z.string(),
        avatar_url: z.string().nullable().optional()
      })
      .passthrough()
      .optional(),
    permissions: z
      .object({
        admin: z.boolean().optional()
      })
      .passthrough()
      .optional()
  })
  .passthrough();

export type GitHubRepositoryPayload = z.infer<typeof GitHubRepositorySchema>;

// ============================================================================
// Organizations
// ============================================================================

export const GitHubOrganizationRefSchema = z.object({ login: z.string() }).passthrough();

export const GitHubOrganizationListSchema = z.array(GitHubOrganizationRefSchema);

export const GitHubOrganizationSchema = z
  .object({
    login: z.string(),
    name: z.string().nullable().optional(),
    email: z.string().nullable().optional(),
    html_url: z.string().nullable().optional(),
    avatar_url: z.string().nullable().optional()
  })
  .passthrough();

export type GitHubOrganizationPayload = z.infer<typeof GitHubOrganizationSchema>;
