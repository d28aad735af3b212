/**
 * Htp1: named accessors over the mirrored mso.
 *
 * Getters read the open transaction's pending value first and fall back to
 * the mirror. Setters only record into the open transaction; nothing reaches
 * the device until commit().
 *
 * @example
 * const htp1 = new Htp1('192.168.1.20');
 * await htp1.connect();
 * await htp1.transact(async (tx) => {
 *   htp1.volume = -35;
 *   htp1.input = 'Blu-ray';
 *   await tx.commit();
 * });
 */

import { DeviceStateError, LookupError } from '../shared/errors';
import { isJsonObject, type JsonObject, type JsonValue } from '../shared/mso-types';
import { DeviceConnection } from '../sync/device-connection';

/** Canonical mso paths for the named fields */
export const MSO_PATHS = {
  power: '/powerIsOn',
  volume: '/volume',
  muted: '/muted',
  input: '/input',
  inputs: '/inputs',
  upmix: '/upmix',
  upmixSelect: '/upmix/select',
  calVph: '/cal/vph',
  calVpl: '/cal/vpl',
  serialNumber: '/versions/SerialNumber',
} as const;

// Key inside /upmix that holds the current selection rather than an upmix
const UPMIX_SELECT_KEY = 'select';

function expectNumber(value: JsonValue | undefined, path: string): number {
  if (typeof value !== 'number') {
    throw new DeviceStateError(`expected a number at ${path}`);
  }
  return value;
}

function expectBoolean(value: JsonValue | undefined, path: string): boolean {
  if (typeof value !== 'boolean') {
    throw new DeviceStateError(`expected a boolean at ${path}`);
  }
  return value;
}

function expectString(value: JsonValue | undefined, path: string): string {
  if (typeof value !== 'string') {
    throw new DeviceStateError(`expected a string at ${path}`);
  }
  return value;
}

export class Htp1 extends DeviceConnection {
  // ============================================================================
  // Read-only
  // ============================================================================

  get serialNumber(): string {
    this.requireState();
    const value = this.mirrorValueAt(MSO_PATHS.serialNumber);
    // Some firmware reports the serial as a number
    if (typeof value === 'number') return String(value);
    return expectString(value, MSO_PATHS.serialNumber);
  }

  /** Calibrated maximum volume (dB) */
  get calVph(): number {
    this.requireState();
    return expectNumber(this.mirrorValueAt(MSO_PATHS.calVph), MSO_PATHS.calVph);
  }

  /** Calibrated minimum volume (dB) */
  get calVpl(): number {
    this.requireState();
    return expectNumber(this.mirrorValueAt(MSO_PATHS.calVpl), MSO_PATHS.calVpl);
  }

  /** Labels of the inputs marked visible, in device order */
  get inputs(): string[] {
    if (!this.state) return [];
    return this.inputEntries()
      .filter(([, info]) => info.visible === true)
      .map(([, info]) => info.label)
      .filter((label): label is string => typeof label === 'string');
  }

  /** Names of the upmixes shown on the home screen, in device order */
  get upmixes(): string[] {
    if (!this.state) return [];
    return this.upmixEntries()
      .filter(([, info]) => info.homevis === true)
      .map(([name]) => name);
  }

  // ============================================================================
  // Read-write
  // ============================================================================

  /** Power state, or null when the device has not reported one */
  get power(): boolean | null {
    const value = this.valueAt(MSO_PATHS.power);
    return typeof value === 'boolean' ? value : null;
  }

  set power(value: boolean) {
    this.writeValue(MSO_PATHS.power, value);
  }

  get volume(): number {
    this.requireState();
    return expectNumber(this.valueAt(MSO_PATHS.volume), MSO_PATHS.volume);
  }

  set volume(value: number) {
    this.writeValue(MSO_PATHS.volume, value);
  }

  get muted(): boolean {
    this.requireState();
    return expectBoolean(this.valueAt(MSO_PATHS.muted), MSO_PATHS.muted);
  }

  set muted(value: boolean) {
    this.writeValue(MSO_PATHS.muted, value);
  }

  /** Label of the selected input */
  get input(): string {
    this.requireState();
    const id = expectString(this.valueAt(MSO_PATHS.input), MSO_PATHS.input);
    const labelPath = `${MSO_PATHS.inputs}/${id}/label`;
    return expectString(this.mirrorValueAt(labelPath), labelPath);
  }

  /**
   * Select an input by its label; the device is sent the input's id.
   * @throws LookupError when no input has this label
   */
  set input(label: string) {
    const match = this.inputEntries().find(([, info]) => info.label === label);
    if (!match) {
      throw new LookupError(`input '${label}' not found`);
    }
    this.writeValue(MSO_PATHS.input, match[0]);
  }

  /** Selected upmix (sound mode) */
  get upmix(): string {
    this.requireState();
    return expectString(this.valueAt(MSO_PATHS.upmixSelect), MSO_PATHS.upmixSelect);
  }

  /**
   * @throws LookupError when the device lists no upmix by this name
   */
  set upmix(name: string) {
    const known = this.upmixEntries().some(([key]) => key === name);
    if (!known) {
      throw new LookupError(`upmix '${name}' not found`);
    }
    this.writeValue(MSO_PATHS.upmixSelect, name);
  }

  // ============================================================================
  // Catalog helpers
  // ============================================================================

  private inputEntries(): Array<[string, JsonObject]> {
    return this.catalog(MSO_PATHS.inputs);
  }

  private upmixEntries(): Array<[string, JsonObject]> {
    return this.catalog(MSO_PATHS.upmix).filter(([key]) => key !== UPMIX_SELECT_KEY);
  }

  private catalog(path: string): Array<[string, JsonObject]> {
    const node = this.mirrorValueAt(path);
    if (!isJsonObject(node)) return [];
    return Object.entries(node).filter(
      (entry): entry is [string, JsonObject] => isJsonObject(entry[1])
    );
  }
}
