#!/usr/bin/env npx tsx
/**
 * Device Watcher
 *
 * Keeps a connection to an HTP-1 open and prints lifecycle changes and
 * updates for the given mso paths until Ctrl+C.
 *
 * Usage:
 *   npx tsx scripts/htp1-watch.ts <host> [path...]
 *
 * Example:
 *   npx tsx scripts/htp1-watch.ts 192.168.1.20 /volume /input /upmix/select
 *
 * The host may also come from HTP1_HOST. Set HTP1_DEBUG=1 for client logs.
 */

import { CONNECTION_SUBJECT, Htp1, loadClientConfig, setDebugLogging } from '../src/index';

const DEFAULT_PATHS = ['/volume', '/muted', '/powerIsOn'];

const config = loadClientConfig();
const HOST = process.argv[2] || config.host;
const PATHS = process.argv.length > 3 ? process.argv.slice(3) : DEFAULT_PATHS;

function timestamp(): string {
  return new Date().toISOString().slice(11, 23);
}

async function main(): Promise<void> {
  if (!HOST) {
    console.error('Usage: npx tsx scripts/htp1-watch.ts <host> [path...]');
    process.exit(1);
  }
  setDebugLogging(config.debug);

  const htp1 = new Htp1(HOST, config);

  console.log('📡 HTP-1 Watcher');
  console.log('='.repeat(60));
  console.log(`Host:  ${HOST}`);
  console.log(`Paths: ${PATHS.join(', ')}`);
  console.log('-'.repeat(60));

  htp1.subscribe(CONNECTION_SUBJECT, () => {
    if (htp1.connected) {
      console.log(`[${timestamp()}] 🟢 connected (serial ${htp1.serialNumber})`);
    } else {
      console.log(`[${timestamp()}] 🔴 connection lost, retrying`);
    }
  });
  for (const path of PATHS) {
    htp1.subscribe(path, (value) => {
      console.log(`[${timestamp()}] ${path} = ${JSON.stringify(value)}`);
    });
  }

  htp1.tryConnect();

  await new Promise<void>((resolve) => {
    process.once('SIGINT', () => {
      console.log('\nStopping...');
      resolve();
    });
  });

  await htp1.stop();
  console.log('Done');
}

main().catch((err) => {
  console.error('Watcher failed:', err);
  process.exit(1);
});
