/**
 * API Request/Response Types
 */

import type { UserStatus } from "../services/sync/types.js";

// ============================================================================
// Error Response
// ============================================================================

export interface ApiError {
  error: string;
  message: string;
  details?: Record<string, unknown>;
  requestId?: string;
}

// ============================================================================
// Mirror Types
// ============================================================================

export interface UserDto {
  id: string;
  loginName: string;
  email: string | null;
  firstName: string | null;
  lastName: string;
  userType: string;
  status: UserStatus;
  validFrom: string | null;
  validTo: string | null;
  company: string | null;
  country: string | null;
  city: string | null;
  directoryLastModified: string | null;
  updatedAt: string | null;
}

export interface GroupDto {
  id: string;
  name: string | null;
  displayName: string | null;
  description: string | null;
  directoryLastModified: string | null;
  updatedAt: string | null;
}

export interface GroupDetailDto extends GroupDto {
  memberCount: number;
}
