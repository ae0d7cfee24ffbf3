import {
  classifyFailure,
  parseBluetoothctlLine,
  ScanOutputCollector
} from '../src/modules/scanner/adapter/bluetoothctl-parser';

describe('parseBluetoothctlLine', () => {
  it('recognises the start of discovery', () => {
    expect(parseBluetoothctlLine('Discovery started')).toEqual({ type: 'discovery_started' });
    expect(parseBluetoothctlLine('[CHG] Controller 00:1A:7D:DA:71:13 Discovering: yes')).toEqual({
      type: 'discovery_started'
    });
  });

  it('reads new devices with and without a name', () => {
    expect(parseBluetoothctlLine('[NEW] Device 11:22:33:44:55:66 Pixel 7')).toEqual({
      type: 'device',
      address: '11:22:33:44:55:66',
      name: 'Pixel 7'
    });
    expect(parseBluetoothctlLine('[NEW] Device 11:22:33:44:55:66 11-22-33-44-55-66')).toEqual({
      type: 'device',
      address: '11:22:33:44:55:66'
    });
  });

  it('reads both RSSI notations', () => {
    expect(parseBluetoothctlLine('[CHG] Device 11:22:33:44:55:66 RSSI: -67')).toEqual({
      type: 'device',
      address: '11:22:33:44:55:66',
      rssi: -67
    });
    expect(parseBluetoothctlLine('[CHG] Device 11:22:33:44:55:66 RSSI: 0xffffffb5 (-75)')).toEqual({
      type: 'device',
      address: '11:22:33:44:55:66',
      rssi: -75
    });
  });

  it('reads name changes', () => {
    expect(parseBluetoothctlLine('[CHG] Device 11:22:33:44:55:66 Name: Living Room TV')).toEqual({
      type: 'device',
      address: '11:22:33:44:55:66',
      name: 'Living Room TV'
    });
  });

  it('strips colour codes and prompts', () => {
    expect(
      parseBluetoothctlLine('\x1b[0;93m[CHG]\x1b[0m Device 11:22:33:44:55:66 RSSI: -50')
    ).toEqual({ type: 'device', address: '11:22:33:44:55:66', rssi: -50 });
    expect(parseBluetoothctlLine('[bluetooth]# [NEW] Device AA:BB:CC:DD:EE:FF Tag')).toEqual({
      type: 'device',
      address: 'AA:BB:CC:DD:EE:FF',
      name: 'Tag'
    });
  });

  it('ignores unrelated lines', () => {
    expect(parseBluetoothctlLine('')).toBeNull();
    expect(parseBluetoothctlLine('[CHG] Device 11:22:33:44:55:66 ManufacturerData Key: 0x004c')).toBeNull();
    expect(parseBluetoothctlLine('[DEL] Device 11:22:33:44:55:66 Pixel 7')).toBeNull();
  });

  it('reports controller failures', () => {
    expect(parseBluetoothctlLine('No default controller available')).toEqual({
      type: 'failure',
      reason: 'unavailable',
      message: 'No default controller available'
    });
    expect(
      parseBluetoothctlLine('Failed to start discovery: org.bluez.Error.NotReady')
    ).toEqual({
      type: 'failure',
      reason: 'unavailable',
      message: 'Failed to start discovery: org.bluez.Error.NotReady'
    });
  });
});

describe('classifyFailure', () => {
  it('maps permission problems to permission_denied', () => {
    expect(classifyFailure('Failed to start discovery: org.bluez.Error.NotPermitted')).toBe(
      'permission_denied'
    );
    expect(classifyFailure('Access denied')).toBe('permission_denied');
    expect(classifyFailure('spawn bluetoothctl EACCES')).toBe('permission_denied');
  });

  it('returns null for ordinary output', () => {
    expect(classifyFailure('Discovery stopped')).toBeNull();
  });
});

describe('ScanOutputCollector', () => {
  const at = new Date(Date.UTC(2024, 5, 1, 8, 0, 0));

  it('skips cached devices listed before discovery starts', () => {
    const collector = new ScanOutputCollector();

    collector.pushStdout('[NEW] Device 11:22:33:44:55:66 Old Speaker', at);
    collector.pushStdout('Discovery started', at);
    collector.pushStdout('[NEW] Device aa:bb:cc:dd:ee:ff Tag', at);

    expect(collector.observations()).toEqual([
      { address: 'AA:BB:CC:DD:EE:FF', name: 'Tag', rssi: 0, seenAt: at }
    ]);
  });

  it('keeps the latest name and RSSI per address', () => {
    const later = new Date(at.getTime() + 2000);
    const collector = new ScanOutputCollector();

    collector.pushStdout('[CHG] Controller 00:1A:7D:DA:71:13 Discovering: yes', at);
    collector.pushStdout('[NEW] Device 11:22:33:44:55:66 11-22-33-44-55-66', at);
    collector.pushStdout('[CHG] Device 11:22:33:44:55:66 RSSI: 0xffffffb5 (-75)', at);
    collector.pushStdout('[CHG] Device 11:22:33:44:55:66 Name: Watch', later);
    collector.pushStdout('[CHG] Device 11:22:33:44:55:66 RSSI: -61', later);

    expect(collector.observations()).toEqual([
      { address: '11:22:33:44:55:66', name: 'Watch', rssi: -61, seenAt: later }
    ]);
  });

  it('keeps the first failure from either stream', () => {
    const collector = new ScanOutputCollector();

    expect(collector.pushStderr('Failed to start discovery: org.bluez.Error.NotPermitted')).toBe(true);
    collector.pushStdout('No default controller available', at);
    expect(collector.pushStderr('some harmless warning')).toBe(false);

    expect(collector.failure).toMatchObject({
      kind: 'adapter',
      reason: 'permission_denied',
      message: 'Failed to start discovery: org.bluez.Error.NotPermitted'
    });
  });
});
