import { NextResponse } from 'next/server';
import { getSyncSettings } from '@/lib/config';
import { logEvent } from '@/lib/log';
import { getJobQueueMetrics } from '@/lib/repos/storyJobs';
import { ensureSchema } from '@/lib/schema';
import { errorMessage } from '@/lib/syncErrors';

export async function GET() {
  try {
    await ensureSchema();
    const jobQueue = await getJobQueueMetrics();
    const settings = getSyncSettings();
    return NextResponse.json({
      ok: true,
      timestamp: new Date().toISOString(),
      services: {
        postgres: 'ready',
        babbel: settings.babbel.baseUrl && settings.babbel.username ? 'configured' : 'not-configured',
        generator: settings.generator.apiKey ? 'configured' : 'not-configured',
      },
      jobQueue,
    });
  } catch (error) {
    logEvent('error', 'health.check_failed', { message: errorMessage(error) });
    return NextResponse.json(
      {
        ok: false,
        error: 'Internal server error',
      },
      { status: 500 },
    );
  }
}
