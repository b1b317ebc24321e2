/**
 * Health Check Endpoint
 *
 * Database reachability and configuration checks for monitoring
 */

import { NextResponse } from 'next/server';
import { getConfig } from '@/lib/config';
import { isDatabaseConfigured, sql } from '@/lib/db';

export const dynamic = 'force-dynamic';

export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  version: string;
  checks: HealthCheck[];
}

export interface HealthCheck {
  name: string;
  status: 'pass' | 'warn' | 'fail';
  latency?: number;
  message?: string;
}

export async function GET() {
  const checks: HealthCheck[] = [await checkDatabase(), checkConfiguration(), checkMemoryUsage()];

  const hasFailure = checks.some((c) => c.status === 'fail');
  const hasWarning = checks.some((c) => c.status === 'warn');

  const status: HealthStatus['status'] = hasFailure
    ? 'unhealthy'
    : hasWarning
    ? 'degraded'
    : 'healthy';

  const response: HealthStatus = {
    status,
    timestamp: new Date().toISOString(),
    version: process.env.npm_package_version || '0.1.0',
    checks,
  };

  return NextResponse.json(response, { status: status === 'unhealthy' ? 503 : 200 });
}

async function checkDatabase(): Promise<HealthCheck> {
  if (!isDatabaseConfigured()) {
    return { name: 'database', status: 'fail', message: 'DATABASE_URL is not configured' };
  }

  const startTime = Date.now();
  try {
    await sql`SELECT 1 as health_check`;
    return {
      name: 'database',
      status: 'pass',
      latency: Date.now() - startTime,
      message: 'Database connection successful',
    };
  } catch (error) {
    return {
      name: 'database',
      status: 'fail',
      latency: Date.now() - startTime,
      message: error instanceof Error ? error.message : 'Database connection failed',
    };
  }
}

/**
 * Missing provider keys only degrade their provider to `unknown`
 */
function checkConfiguration(): HealthCheck {
  const config = getConfig();
  const issues: string[] = [];

  if (!config.telegram.botToken) issues.push('Missing TELEGRAM_BOT_TOKEN');
  if (!config.providers.phishtankApiKey) issues.push('Missing PHISHTANK_API_KEY');
  if (!config.providers.safeBrowsingApiKey) issues.push('Missing GOOGLE_SAFE_BROWSING_API_KEY');

  if (issues.length > 0) {
    return { name: 'configuration', status: 'warn', message: issues.join(', ') };
  }
  return { name: 'configuration', status: 'pass', message: 'All settings configured' };
}

function checkMemoryUsage(): HealthCheck {
  const usage = process.memoryUsage();
  const heapUsedMB = Math.round(usage.heapUsed / 1024 / 1024);
  const heapTotalMB = Math.round(usage.heapTotal / 1024 / 1024);
  const heapPercent = (usage.heapUsed / usage.heapTotal) * 100;

  let status: HealthCheck['status'] = 'pass';
  let message = `Heap: ${heapUsedMB}MB / ${heapTotalMB}MB (${heapPercent.toFixed(1)}%)`;

  if (heapPercent > 90) {
    status = 'fail';
    message = `Memory critical: ${message}`;
  } else if (heapPercent > 75) {
    status = 'warn';
    message = `Memory warning: ${message}`;
  }

  return { name: 'memory', status, message };
}

/**
 * Liveness probe
 */
export async function HEAD() {
  return new NextResponse(null, { status: 200 });
}
