import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { Htp1 } from './htp1';
import { MediaPlayer } from './media-player';
import { MockDevice, settle } from '../../test/mocks/MockDevice';
import { createMso } from '../../test/mocks/mso-fixture';

let device: MockDevice;
let htp1: Htp1;
let player: MediaPlayer;

beforeEach(async () => {
  device = new MockDevice({ mso: createMso() });
  htp1 = new Htp1('192.0.2.30', { transport: device, msoTimeoutMs: 50 });
  player = new MediaPlayer(htp1);
  await htp1.connect();
});

afterEach(async () => {
  await htp1.stop();
});

describe('MediaPlayer state', () => {
  it('reports the device fields', () => {
    expect(player.uniqueId).toBe('TEST-0001');
    expect(player.available).toBe(true);
    expect(player.state).toBe('on');
    expect(player.isVolumeMuted).toBe(false);
    expect(player.source).toBe('TV');
    expect(player.soundMode).toBe('native');
  });

  it('scales volume to the calibrated range', () => {
    expect(player.volumeLevel).toBe(0.5);
  });

  it('sorts the source and sound mode lists', () => {
    expect(player.sourceList).toEqual(['Blu-ray', 'Console', 'TV']);
    expect(player.soundModeList).toEqual(['auro', 'dolby', 'native']);
  });

  it('reports off and unavailable after the device goes away', async () => {
    device.current.pushUpdate([{ op: 'replace', path: '/powerIsOn', value: false }]);
    await settle();
    expect(player.state).toBe('off');

    await htp1.stop();
    expect(player.available).toBe(false);
  });
});

describe('MediaPlayer commands', () => {
  it('turns the device on and off', async () => {
    await player.turnOff();
    await player.turnOn();

    expect(device.changeFrames).toEqual([
      'changemso [{"op":"replace","path":"/powerIsOn","value":false}]',
      'changemso [{"op":"replace","path":"/powerIsOn","value":true}]',
    ]);
  });

  it('maps a volume level onto the calibrated range', async () => {
    await player.setVolumeLevel(0.25);

    expect(device.changeFrames).toEqual(['changemso [{"op":"replace","path":"/volume","value":-60}]']);
  });

  it('clamps the volume level to 0..1', async () => {
    await player.setVolumeLevel(2);
    await player.setVolumeLevel(-1);

    expect(device.changeFrames).toEqual([
      'changemso [{"op":"replace","path":"/volume","value":0}]',
      'changemso [{"op":"replace","path":"/volume","value":-80}]',
    ]);
  });

  it('steps the volume by one dB from the mirrored value', async () => {
    await player.volumeUp();
    await player.volumeDown();

    expect(device.changeFrames).toEqual([
      'changemso [{"op":"replace","path":"/volume","value":-39}]',
      'changemso [{"op":"replace","path":"/volume","value":-41}]',
    ]);
  });

  it('mutes and selects source and sound mode', async () => {
    await player.mute(true);
    await player.selectSource('Console');
    await player.selectSoundMode('auro');

    expect(device.changeFrames).toEqual([
      'changemso [{"op":"replace","path":"/muted","value":true}]',
      'changemso [{"op":"replace","path":"/input","value":"h4"}]',
      'changemso [{"op":"replace","path":"/upmix/select","value":"auro"}]',
    ]);
    expect(htp1.inTransaction).toBe(false);
  });

  it('sends nothing for an unknown source and releases the transaction', async () => {
    await expect(player.selectSource('Projector')).rejects.toThrow("input 'Projector' not found");

    expect(device.changeFrames).toEqual([]);
    expect(htp1.inTransaction).toBe(false);
  });
});

describe('MediaPlayer.watch', () => {
  it('calls back for watched paths until unwatched', async () => {
    const onChange = vi.fn();
    const unwatch = player.watch(onChange);

    device.current.pushUpdate([
      { op: 'replace', path: '/volume', value: -30 },
      { op: 'replace', path: '/cal/vph', value: 5 },
      { op: 'replace', path: '/upmix/select', value: 'dolby' },
    ]);
    await settle();
    expect(onChange).toHaveBeenCalledTimes(2);

    unwatch();
    device.current.pushUpdate([{ op: 'replace', path: '/muted', value: true }]);
    await settle();
    expect(onChange).toHaveBeenCalledTimes(2);
  });
});
