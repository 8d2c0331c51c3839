import type { NextRequest, NextResponse } from 'next/server';
import { jsonError, type ErrorBody } from './errors';

export type AuthMode = 'open' | 'headers';

export type AuthRole = 'admin' | 'editor' | 'viewer';

/**
 * Editing posts (and with it triggering story sync) is separate from managing
 * the Babbel connection and reading troubleshooting data.
 */
export type Permission = 'read_posts' | 'edit_posts' | 'manage_sync';

export type AuthContext = {
  mode: AuthMode;
  user: string;
  role: AuthRole | null;
};

const ROLE_PERMISSIONS: Record<AuthRole, readonly Permission[]> = {
  viewer: ['read_posts'],
  editor: ['read_posts', 'edit_posts'],
  admin: ['read_posts', 'edit_posts', 'manage_sync'],
};

export const USER_HEADER = 'x-story-sync-user';
export const ROLE_HEADER = 'x-story-sync-role';

export function parseAuthMode(value: string | undefined): AuthMode {
  return (value || '').trim() === 'open' ? 'open' : 'headers';
}

function parseRole(value: string | null): AuthRole | null {
  const trimmed = (value || '').trim();
  if (trimmed === 'admin' || trimmed === 'editor' || trimmed === 'viewer') return trimmed;
  return null;
}

export function getAuthContext(request: NextRequest, env: NodeJS.ProcessEnv = process.env): AuthContext {
  const mode = parseAuthMode(env.STORY_SYNC_AUTH_MODE);
  if (mode === 'open') {
    return { mode, user: 'system', role: 'admin' };
  }
  return {
    mode,
    user: (request.headers.get(USER_HEADER) || '').trim(),
    role: parseRole(request.headers.get(ROLE_HEADER)),
  };
}

export function hasPermission(role: AuthRole | null, permission: Permission): boolean {
  return role !== null && ROLE_PERMISSIONS[role].includes(permission);
}

export function requirePermission(
  request: NextRequest,
  permission: Permission,
  env: NodeJS.ProcessEnv = process.env,
): NextResponse<ErrorBody> | null {
  const auth = getAuthContext(request, env);
  if (!auth.user) {
    return jsonError(401, 'UNAUTHENTICATED', `Missing ${USER_HEADER}`);
  }
  if (!hasPermission(auth.role, permission)) {
    return jsonError(403, 'FORBIDDEN', `Missing permission ${permission}`);
  }
  return null;
}
