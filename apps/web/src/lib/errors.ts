import { NextResponse } from 'next/server';

export type ErrorBody = {
  error: {
    code: string;
    message: string;
  };
};

export function jsonError(status: number, code: string, message: string): NextResponse<ErrorBody> {
  return NextResponse.json({ error: { code, message } }, { status });
}

export function postNotFound(postId: string): NextResponse<ErrorBody> {
  return jsonError(404, 'POST_NOT_FOUND', `Post not found: ${postId}`);
}

// Troubleshooting endpoints do not exist outside debug mode.
export function debugDisabled(): NextResponse<ErrorBody> {
  return jsonError(404, 'NOT_FOUND', 'Not found');
}
