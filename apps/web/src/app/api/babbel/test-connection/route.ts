import { NextRequest, NextResponse } from 'next/server';
import { runApi } from '@/lib/api';
import { requirePermission } from '@/lib/auth';
import { testBabbelConnection } from '@/lib/services/storySync';

export async function POST(request: NextRequest) {
  return runApi(async () => {
    const authError = requirePermission(request, 'manage_sync');
    if (authError) return authError;
    const result = await testBabbelConnection();
    return NextResponse.json(result, { status: result.success ? 200 : 502 });
  });
}
