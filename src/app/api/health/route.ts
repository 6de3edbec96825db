import fs from 'node:fs/promises';
import { NextResponse } from 'next/server';
import { getServerConfig } from '@/lib/config';
import { getRedisClient } from '@/lib/redis';

// This route should be dynamic to avoid static generation during build
export const dynamic = 'force-dynamic';

async function pathStatus(target: string): Promise<'ok' | 'missing'> {
  try {
    await fs.access(target);
    return 'ok';
  } catch {
    return 'missing';
  }
}

export async function GET() {
  try {
    const config = getServerConfig();

    // Check if REDIS_URL is configured
    const redisConfigured = !!process.env.REDIS_URL;

    // Check Redis connection
    const redis = await getRedisClient();
    let redisStatus = 'disconnected';

    if (!redisConfigured) {
      redisStatus = 'not_configured';
    } else if (redis) {
      try {
        await redis.ping();
        redisStatus = 'connected';
      } catch {
        redisStatus = 'error';
      }
    }

    return NextResponse.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      services: {
        redis: redisStatus,
        gage_file: await pathStatus(config.gageFile),
        data_dir: await pathStatus(config.dataDir),
        app: 'running'
      },
      config: {
        redis_url_configured: redisConfigured,
        node_env: process.env.NODE_ENV || 'development'
      }
    });
  } catch (error) {
    return NextResponse.json(
      {
        status: 'unhealthy',
        timestamp: new Date().toISOString(),
        error: error instanceof Error ? error.message : 'Unknown error'
      },
      { status: 500 }
    );
  }
}
