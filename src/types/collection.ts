import { z } from 'zod';
import { PidSchema } from './pid';

// =============================================================================
// Query results
// =============================================================================

/**
 * Visibility capability passed to the query backend
 * - view: only Active members
 * - manage: members in every state (for management screens)
 */
export const FilterModeSchema = z.enum(['view', 'manage']);

export type FilterMode = z.infer<typeof FilterModeSchema>;

/**
 * MemberRecord - Read-only projection of a collection member.
 * Rehydrated per query; carries no identity beyond its PID.
 */
export interface MemberRecord {
  pid: string;
  title?: string;
  owner?: string;
  modified?: string; // ISO 8601
}

/**
 * PageResult - One page of members plus the total independent of paging
 */
export interface PageResult {
  total: number;
  items: MemberRecord[];
}

/**
 * Collection object returned by the backend's collection lookup
 */
export interface CollectionCandidate {
  pid: string;
  label: string;
}

// =============================================================================
// Request Schemas
// =============================================================================

// Maximum number of children that can be migrated/shared in a single request
export const MAX_CHILDREN_PER_REQUEST = 100;

/**
 * POST /collections/:pid/members
 */
export const AddMemberRequestSchema = z.object({
  member_pid: PidSchema,
});

/**
 * POST /collections/:pid/migrate and POST /collections/:pid/share
 */
export const TransferMembersRequestSchema = z.object({
  children: z.array(PidSchema).min(1).max(MAX_CHILDREN_PER_REQUEST),
  destination: PidSchema,
});

export type TransferMembersRequest = z.infer<typeof TransferMembersRequestSchema>;

/**
 * GET /collections/:pid/members query string
 */
export const ListMembersQuerySchema = z.object({
  page: z.string().optional(),
  limit: z.string().optional(),
  mode: FilterModeSchema.optional(),
});

// =============================================================================
// Response Types
// =============================================================================

export interface ListMembersResponse {
  collection: string;
  page: number;
  limit: number;
  total: number;
  total_pages: number;
  items: MemberRecord[];
}

export interface MembershipResponse {
  collection: string;
  member: string;
  parents: string[];
}

export interface TransferMembersResponse {
  source: string;
  destination: string;
  moved: string[];
}

export interface ParentsResponse {
  pid: string;
  parents: string[];
  excluded?: string;
}

export type SearchCollectionsResponse = Record<string, string>;
