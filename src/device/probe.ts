/**
 * One-shot reachability check for a host, used before a device is saved:
 * connect, read the serial number, disconnect.
 */

import { Htp1 } from './htp1';
import type { DeviceConnectionOptions } from '../sync/device-connection';

export interface ProbeInput {
  host: string;
  /** Display name; defaults to the host */
  name?: string;
}

export interface ProbeResult {
  title: string;
  serialNumber: string;
}

/**
 * @throws ConnectionError when the host cannot be reached or sends no mso in time
 */
export async function validateHost(
  input: ProbeInput,
  options: DeviceConnectionOptions = {}
): Promise<ProbeResult> {
  const htp1 = new Htp1(input.host, options);
  try {
    await htp1.connect();
    return {
      title: input.name || input.host,
      serialNumber: htp1.serialNumber,
    };
  } finally {
    await htp1.stop();
  }
}
