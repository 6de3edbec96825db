import { NextRequest, NextResponse } from 'next/server';
import { getServerConfig } from '@/lib/config';
import { errorMessage } from '@/lib/errors';
import { getDashboardRivers } from '@/services/dashboard';

export const dynamic = 'force-dynamic';

export async function GET(request: NextRequest) {
  const region = request.nextUrl.searchParams.get('region');

  try {
    const rivers = await getDashboardRivers(getServerConfig(), region);
    return NextResponse.json({
      region: region ?? 'all',
      rivers,
      timestamp: new Date().toISOString(),
    });
  } catch (error) {
    console.error('[API] Error building gage summaries:', error);
    return NextResponse.json(
      { error: `Failed to load gages: ${errorMessage(error)}` },
      { status: 500 }
    );
  }
}
