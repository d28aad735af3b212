/**
 * Media player facade
 *
 * The operations a home-automation media player needs, expressed over an
 * Htp1: power, 0..1 volume scaled to the calibrated range, mute, source and
 * sound mode selection. Each command is one transaction and one commit.
 */

import { CONNECTION_SUBJECT } from '../sync/subscriptions';
import { Htp1, MSO_PATHS } from './htp1';

export type PlayerState = 'on' | 'off';

/** Volume change for one volumeUp()/volumeDown(), in dB */
export const VOLUME_STEP_DB = 1;

const WATCHED_SUBJECTS = [
  MSO_PATHS.power,
  MSO_PATHS.volume,
  MSO_PATHS.muted,
  MSO_PATHS.input,
  MSO_PATHS.upmixSelect,
  CONNECTION_SUBJECT,
];

export class MediaPlayer {
  constructor(readonly device: Htp1) {}

  get uniqueId(): string {
    return this.device.serialNumber;
  }

  get available(): boolean {
    return this.device.connected;
  }

  get state(): PlayerState {
    return this.device.power ? 'on' : 'off';
  }

  /** Volume as 0..1 of the calibrated range */
  get volumeLevel(): number {
    const { calVpl, calVph } = this.device;
    return (this.device.volume - calVpl) / (calVph - calVpl);
  }

  get isVolumeMuted(): boolean {
    return this.device.muted;
  }

  get source(): string {
    return this.device.input;
  }

  get sourceList(): string[] {
    return [...this.device.inputs].sort();
  }

  get soundMode(): string {
    return this.device.upmix;
  }

  get soundModeList(): string[] {
    return [...this.device.upmixes].sort();
  }

  async turnOn(): Promise<void> {
    await this.device.transact(async (tx) => {
      this.device.power = true;
      await tx.commit();
    });
  }

  async turnOff(): Promise<void> {
    await this.device.transact(async (tx) => {
      this.device.power = false;
      await tx.commit();
    });
  }

  /**
   * Set the volume from a 0..1 level (clamped).
   */
  async setVolumeLevel(level: number): Promise<void> {
    const { calVpl, calVph } = this.device;
    const clamped = Math.min(Math.max(level, 0), 1);
    await this.device.transact(async (tx) => {
      this.device.volume = clamped * (calVph - calVpl) + calVpl;
      await tx.commit();
    });
  }

  async volumeUp(): Promise<void> {
    await this.stepVolume(VOLUME_STEP_DB);
  }

  async volumeDown(): Promise<void> {
    await this.stepVolume(-VOLUME_STEP_DB);
  }

  async mute(muted: boolean): Promise<void> {
    await this.device.transact(async (tx) => {
      this.device.muted = muted;
      await tx.commit();
    });
  }

  async selectSource(label: string): Promise<void> {
    await this.device.transact(async (tx) => {
      this.device.input = label;
      await tx.commit();
    });
  }

  async selectSoundMode(name: string): Promise<void> {
    await this.device.transact(async (tx) => {
      this.device.upmix = name;
      await tx.commit();
    });
  }

  /**
   * Call `onChange` whenever anything the player reports may have changed.
   * @returns A function that removes every registration
   */
  watch(onChange: () => void | Promise<void>): () => void {
    const unsubscribers = WATCHED_SUBJECTS.map((subject) =>
      this.device.subscribe(subject, () => onChange())
    );
    return () => unsubscribers.forEach((unsubscribe) => unsubscribe());
  }

  private async stepVolume(deltaDb: number): Promise<void> {
    await this.device.transact(async (tx) => {
      // Reads the mirror: a second step before the device echoes the first
      // starts from the same value
      this.device.volume = this.device.volume + deltaDb;
      await tx.commit();
    });
  }
}
