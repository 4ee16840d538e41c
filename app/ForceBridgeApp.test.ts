import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ForceBridgeApp } from './ForceBridgeApp';
import { AppConfig, DEFAULT_APP_CONFIG } from '../shared/config';
import { ForceFrameProtocol, MockForceTransport } from '../ble-bridge';
import { SessionState } from '../ble-management';
import { CalibrationError } from '../forceProcessing/calibration';
import { SessionMeta } from '../forceProcessing/recording';

const META: SessionMeta = { athleteId: 'athlete-7', distanceCm: 40, weightKg: 70 };

function frame(v3: number): string {
  return ForceFrameProtocol.formatFrame({ deviceTimeMs: 0, channels: [0, 0, v3, 0] });
}

function listArtifacts(dir: string): string[] {
  return fs.readdirSync(dir, { recursive: true, encoding: 'utf-8' })
    .filter(name => name.endsWith('_grip_data.csv'))
    .sort();
}

describe('ForceBridgeApp', () => {
  let tmpDir: string;
  let transport: MockForceTransport;
  let config: AppConfig;
  let app: ForceBridgeApp;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'force-bridge-'));
    transport = new MockForceTransport();
    transport.addDevice('dev-b', 'Force B');
    transport.addDevice('dev-hr', 'Heart Rate');
    transport.addDevice('dev-a', 'force A');

    config = {
      ...DEFAULT_APP_CONFIG,
      readingsDir: tmpDir,
      calibrationCsv: path.join(__dirname, '../calibrationWeight/V3_calibration.csv'),
      logLevel: 'error',
      logFile: null,
      useMockTransport: true,
    };
    app = new ForceBridgeApp(config, { transport, sessionTiming: { baselineWindowMs: 5 } });
  });

  afterEach(async () => {
    await app.shutdown();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  async function connectAll(): Promise<void> {
    await app.initialize();
    await app.scan();
    const response = await app.connect(['dev-a', 'dev-b']);
    expect(response.success).toBe(true);
  }

  test('initialize fails with an unusable calibration table', async () => {
    const broken = new ForceBridgeApp(
      { ...config, calibrationCsv: path.join(tmpDir, 'missing.csv') },
      { transport }
    );
    await expect(broken.initialize()).rejects.toBeInstanceOf(CalibrationError);
  });

  test('scan is refused before initialize', async () => {
    await expect(app.scan()).resolves.toEqual({ success: false, message: 'Not initialized' });
  });

  test('scan lists matching devices sorted by name', async () => {
    await app.initialize();

    const response = await app.scan();

    expect(response.data).toEqual([
      { id: 'dev-a', name: 'force A' },
      { id: 'dev-b', name: 'Force B' },
    ]);
    expect(app.getStatus()).toMatchObject({ initialized: true, transport: 'mock' });
  });

  test('connect reports devices missing from the last scan', async () => {
    await app.initialize();
    await app.scan();

    const response = await app.connect(['dev-a', 'dev-hr']);

    expect(response.success).toBe(false);
    expect(response.message).toBe('1/2 connected');
    expect(response.data?.[1]).toMatchObject({ deviceId: 'dev-hr', success: false });
  });

  test('start and stop reading across all connected devices', async () => {
    await connectAll();

    expect((await app.startReading(META)).message).toBe('2/2 reading');
    transport.pushFrame('dev-a', frame(1500));
    transport.pushFrame('dev-b', frame(1600));

    const refused = await app.disconnect(['dev-a']);
    expect(refused).toEqual({ success: false, message: 'Stop reading before disconnecting: dev-a' });

    const stopped = await app.stopReading(META);
    expect(stopped.message).toBe('2/2 saved');
    expect(listArtifacts(tmpDir)).toHaveLength(2);

    const disconnected = await app.disconnect(['dev-a']);
    expect(disconnected.success).toBe(true);
    expect(app.getSnapshots().map(s => s.state)).toEqual([SessionState.IDLE, SessionState.ARMED]);
  });

  test('start and stop report when there is nothing to act on', async () => {
    await app.initialize();
    await expect(app.startReading(META)).resolves.toEqual({ success: false, message: 'No armed devices' });
    await expect(app.stopReading(META)).resolves.toEqual({ success: false, message: 'No devices are reading' });
  });

  test('shutdown saves running captures and disconnects', async () => {
    await connectAll();
    await app.startReading(META);
    transport.pushFrame('dev-a', frame(1500));

    await app.shutdown();

    // dev-b had no samples, so only dev-a produced an artifact
    expect(listArtifacts(tmpDir)).toHaveLength(1);
    expect(transport.isLinkOpen('dev-a')).toBe(false);
    expect(transport.isLinkOpen('dev-b')).toBe(false);
    expect(app.getStatus().initialized).toBe(false);
  });
});
