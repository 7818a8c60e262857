/**
 * Load generator: simulated users asking for delivery prices.
 *
 * Usage:
 *   API_BASE_URL=http://localhost:8000 LOAD_USERS=50 LOAD_REQUESTS_PER_USER=2 \
 *     npx ts-node scripts/load/user-requests.ts
 *
 * Each user sends LOAD_REQUESTS_PER_USER requests from a random spot near a
 * Helsinki landmark, LOAD_DELAY_MS apart. At most LOAD_CONCURRENCY requests
 * are in flight at once.
 */

import { AdmissionGate } from '../../src/shared/resilience/admission-gate';

type Outcome = 'success' | 'distanceRejected' | 'otherErrors' | 'connectionErrors';

const baseUrl = process.env.API_BASE_URL || 'http://localhost:8000';
const endpoint = process.env.PRICING_ENDPOINT || '/api/v1/delivery-order-price';
const venueSlug = process.env.LOAD_VENUE_SLUG || 'home-assignment-venue-helsinki';
const users = Number(process.env.LOAD_USERS || 50);
const requestsPerUser = Number(process.env.LOAD_REQUESTS_PER_USER || 2);
const delayMs = Number(process.env.LOAD_DELAY_MS || 500);
const concurrency = Number(process.env.LOAD_CONCURRENCY || 100);

const LOCATIONS: Array<[number, number]> = [
  [60.17045, 24.93147], // Central Station
  [60.16866, 24.92538], // Kamppi
  [60.18526, 24.95083], // Kallio
  [60.15824, 24.94459], // Kaivopuisto
  [60.18785, 24.98226]  // Kulosaari
];

const CART_VALUES = [500, 1000, 1500, 2000, 2500, 3000];

const LOCATION_JITTER = 0.002;

const stats: Record<Outcome, number> = {
  success: 0,
  distanceRejected: 0,
  otherErrors: 0,
  connectionErrors: 0
};
const latenciesMs: number[] = [];
const gate = new AdmissionGate({ capacity: concurrency, name: 'load' });

function pick<T>(items: readonly T[]): T {
  return items[Math.floor(Math.random() * items.length)];
}

function jitter(value: number): number {
  return value + (Math.random() * 2 - 1) * LOCATION_JITTER;
}

function buildQuery(): URLSearchParams {
  const [lat, lon] = pick(LOCATIONS);
  return new URLSearchParams({
    venue_slug: venueSlug,
    cart_value: String(pick(CART_VALUES)),
    user_lat: jitter(lat).toFixed(6),
    user_lon: jitter(lon).toFixed(6)
  });
}

function classify(status: number, body: string): Outcome {
  if (status === 200) return 'success';
  if (body.includes('DISTANCE_EXCEEDED') || body.includes('NO_RANGE_FOUND')) return 'distanceRejected';
  return 'otherErrors';
}

async function sendRequest(userId: number): Promise<void> {
  const url = `${baseUrl}${endpoint}?${buildQuery().toString()}`;
  const started = Date.now();

  try {
    const response = await fetch(url);
    const body = await response.text();
    const elapsed = Date.now() - started;
    latenciesMs.push(elapsed);

    const outcome = classify(response.status, body);
    stats[outcome]++;
    console.log(`User ${String(userId).padStart(3)} | ${response.status} | ${elapsed}ms | ${outcome === 'success' ? body : body.slice(0, 100)}`);
  } catch (error) {
    stats.connectionErrors++;
    console.log(`User ${String(userId).padStart(3)} | Connection error: ${error instanceof Error ? error.message : String(error)}`);
  }
}

async function simulateUser(userId: number): Promise<void> {
  for (let i = 0; i < requestsPerUser; i++) {
    await gate.run(() => sendRequest(userId));
    if (i < requestsPerUser - 1) {
      await new Promise(resolve => setTimeout(resolve, delayMs));
    }
  }
}

function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const index = Math.min(sorted.length - 1, Math.ceil((p / 100) * sorted.length) - 1);
  return sorted[Math.max(0, index)];
}

function printSummary(durationMs: number): void {
  const total = Object.values(stats).reduce((sum, count) => sum + count, 0);
  const share = (count: number) => (total > 0 ? ((count / total) * 100).toFixed(1) : '0.0');
  const sorted = [...latenciesMs].sort((a, b) => a - b);

  console.log('\n=== Load Test Summary ===');
  console.log(`Users: ${users}, requests per user: ${requestsPerUser}, total: ${total}`);
  console.log(`Duration: ${(durationMs / 1000).toFixed(2)}s`);
  console.log(`Successful:        ${stats.success} (${share(stats.success)}%)`);
  console.log(`Distance rejected: ${stats.distanceRejected} (${share(stats.distanceRejected)}%)`);
  console.log(`Other errors:      ${stats.otherErrors} (${share(stats.otherErrors)}%)`);
  console.log(`Connection errors: ${stats.connectionErrors} (${share(stats.connectionErrors)}%)`);

  if (sorted.length > 0) {
    console.log('\nLatency:');
    console.log(`  min ${sorted[0]}ms | p50 ${percentile(sorted, 50)}ms | p95 ${percentile(sorted, 95)}ms | max ${sorted[sorted.length - 1]}ms`);
  }
}

async function run(): Promise<void> {
  console.log(`[load] ${users} users → ${baseUrl}${endpoint}`);
  const started = Date.now();
  await Promise.all(Array.from({ length: users }, (_unused, userId) => simulateUser(userId)));
  printSummary(Date.now() - started);
}

run().catch((err) => {
  console.error('[load] failed:', err);
  process.exit(1);
});
