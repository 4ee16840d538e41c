/**
 * Device Session
 *
 * One force sensor's lifecycle: connect, baseline warm-up, armed, reading, stop,
 * intentional disconnect and recovery after an unexpected link loss.
 *
 * Every operation and every link-lost message runs through the session's
 * SessionOperationQueue. Notification frames are appended directly from the
 * transport callback, but only while the session is READING.
 */

import {
  bleLogger,
  describeError,
  DeviceIdentity,
  FORCE_BLE_CONFIG,
  ForceFrameProtocol,
  IForceLink,
  IForceTransport,
} from '../ble-bridge';
import { CalibrationModel } from '../forceProcessing/calibration';
import { ArtifactWriteError, DEFAULT_SESSION_META, Sample, SessionMeta, SessionRecorder } from '../forceProcessing/recording';
import { median } from '../forceProcessing/shared/statistics';
import { delay, TimeoutError, withTimeout } from '../shared/async';
import { SessionOperationQueue } from './SessionOperationQueue';
import {
  CONNECTED_STATES,
  DEFAULT_SESSION_TIMING,
  InvalidTransitionError,
  SESSION_TRANSITION_RULES,
  SessionCapabilities,
  SessionSnapshot,
  SessionState,
  SessionTimingConfig,
} from './types';

export interface DeviceSessionDeps {
  transport: IForceTransport;
  calibration: CalibrationModel;
  recorder: SessionRecorder;
  timing?: Partial<SessionTimingConfig>;
  /** Notification characteristic the sensor streams on */
  channelId?: string;
  capabilities?: SessionCapabilities;
}

export class DeviceSession {
  readonly identity: DeviceIdentity;

  private readonly transport: IForceTransport;
  private readonly calibration: CalibrationModel;
  private readonly recorder: SessionRecorder;
  private readonly timing: SessionTimingConfig;
  private readonly channelId: string;
  private readonly capabilities: SessionCapabilities;
  private readonly queue: SessionOperationQueue;

  private state = SessionState.IDLE;
  private link: IForceLink | null = null;
  // Bumped whenever a link is opened or given up; link-lost events carry the value they were opened with
  private linkGeneration = 0;
  private linkError = false;
  private intentionalDisconnect = false;
  private baseline = 0;

  private rawSamples: Sample[] = [];
  private forceSamples: Sample[] = [];
  private meta: SessionMeta | null = null;

  constructor(identity: DeviceIdentity, deps: DeviceSessionDeps) {
    this.identity = { ...identity };
    this.transport = deps.transport;
    this.calibration = deps.calibration;
    this.recorder = deps.recorder;
    this.timing = { ...DEFAULT_SESSION_TIMING, ...deps.timing };
    this.channelId = deps.channelId ?? FORCE_BLE_CONFIG.NOTIFY_CHARACTERISTIC_UUID;
    this.capabilities = deps.capabilities ?? {};
    this.queue = new SessionOperationQueue(identity.id);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Public Operations (all serialized through the session queue)
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Open a fresh link, measure the baseline and arm the session.
   * @returns false when the link could not be opened; there is no automatic retry
   */
  connect(): Promise<boolean> {
    return this.queue.submit('connect', () => this.doConnect());
  }

  /**
   * Clear buffers and begin collecting samples.
   * @returns false unless the session is armed with a live link
   */
  startReading(meta: SessionMeta): Promise<boolean> {
    return this.queue.submit('startReading', async () => this.doStartReading(meta));
  }

  /**
   * Persist the capture and return to armed.
   * @returns the artifact path, null when nothing was buffered or the session was not reading
   * @throws ArtifactWriteError after the session has cleared its buffers and re-armed
   */
  stopReading(meta: SessionMeta): Promise<string | null> {
    return this.queue.submit('stopReading', () => this.doStopReading(meta));
  }

  /** Always resolves true once attempted. */
  disconnect(): Promise<boolean> {
    return this.queue.submit('disconnect', () => this.doDisconnect());
  }

  /** Resolves once queued work, including any recovery, has finished */
  idle(): Promise<void> {
    return this.queue.idle();
  }

  getSnapshot(): SessionSnapshot {
    return {
      identity: { ...this.identity },
      state: this.state,
      isConnected: this.isConnected,
      isReading: this.isReading,
      linkError: this.linkError,
      baseline: this.baseline,
      sampleCount: this.rawSamples.length,
    };
  }

  get isConnected(): boolean {
    return CONNECTED_STATES.has(this.state) && this.link !== null && this.link.isConnected;
  }

  /** False as soon as the link drops, before the queued recovery has run */
  get isReading(): boolean {
    return this.state === SessionState.READING && this.isConnected;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Connect & Baseline
  // ───────────────────────────────────────────────────────────────────────────

  private async doConnect(): Promise<boolean> {
    if (this.isConnected) {
      bleLogger.logConnection(this.identity.id, this.identity.name, 'Already connected');
      return true;
    }

    if (this.state !== SessionState.IDLE) {
      // Link dropped and its link-lost message has not been processed yet
      await this.recoverFromLinkLoss(this.linkGeneration);
    }

    this.linkError = false;
    this.transition(SessionState.CONNECTING);
    this.notifyStateChanged();

    await this.releaseLink('stale link');

    const generation = ++this.linkGeneration;
    let opening: Promise<IForceLink> | null = null;
    let link: IForceLink;
    try {
      opening = this.transport.open(
        this.identity.id,
        () => this.handleLinkLostSignal(generation),
        this.timing.connectTimeoutMs
      );
      link = await withTimeout(opening, this.timing.connectTimeoutMs, 'Connection timeout');
    } catch (error) {
      bleLogger.logConnectionError(this.identity.id, this.identity.name, 'Connect', error);
      if (error instanceof TimeoutError && opening) {
        this.closeAbandonedLink(opening);
      }
      return this.abortConnect();
    }

    if (!link.isConnected) {
      bleLogger.logConnectionError(this.identity.id, this.identity.name, 'Connect', 'link opened in a disconnected state');
      return this.abortConnect();
    }
    this.link = link;

    this.transition(SessionState.BASELINE_CALIBRATING);
    this.notifyStateChanged();

    try {
      this.baseline = await this.measureBaseline(link);
      await this.transport.subscribe(link, this.channelId, data => this.handleFrame(data));
    } catch (error) {
      bleLogger.logConnectionError(this.identity.id, this.identity.name, 'Baseline/subscribe', error);
      await this.releaseLink('failed connect');
      return this.abortConnect();
    }

    this.transition(SessionState.ARMED);
    this.linkError = false;
    this.notifyStateChanged();

    bleLogger.logConnection(this.identity.id, this.identity.name, 'Armed', { baseline: this.baseline });
    return true;
  }

  // A link that opens after its timeout is closed straight away; its loss signal is already stale
  private closeAbandonedLink(opening: Promise<IForceLink>): void {
    void opening
      .then(link => this.transport.close(link))
      .catch(error => {
        bleLogger.debug('Abandoned open settled with an error', { deviceId: this.identity.id, ...describeError(error) }, 'SESSION');
      });
  }

  private abortConnect(): boolean {
    this.link = null;
    this.linkGeneration++;
    this.transition(SessionState.IDLE);
    this.notifyStateChanged();
    return false;
  }

  /**
   * Collect raw values for the fixed warm-up window and return their median (0 when none arrived).
   */
  private async measureBaseline(link: IForceLink): Promise<number> {
    const values: number[] = [];

    await this.transport.subscribe(link, this.channelId, data => {
      const raw = ForceFrameProtocol.parseRawValue(data);
      if (raw !== null) values.push(raw);
    });

    await delay(this.timing.baselineWindowMs);

    try {
      await this.transport.unsubscribe(link, this.channelId);
    } catch (error) {
      bleLogger.warn('Baseline unsubscribe failed', { deviceId: this.identity.id, ...describeError(error) }, 'SESSION');
    }

    const baseline = values.length > 0 ? median(values) : 0;
    bleLogger.info(
      `Baseline ${baseline} from ${values.length} samples`,
      { deviceId: this.identity.id, windowMs: this.timing.baselineWindowMs },
      'SESSION'
    );
    return baseline;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Reading
  // ───────────────────────────────────────────────────────────────────────────

  private doStartReading(meta: SessionMeta): boolean {
    if (this.state !== SessionState.ARMED || !this.isConnected) {
      bleLogger.warn(`Cannot start reading in state ${this.state}`, { deviceId: this.identity.id }, 'SESSION');
      return false;
    }

    this.clearBuffers();
    this.meta = { ...meta };
    this.transition(SessionState.READING);
    this.notifyStateChanged();
    return true;
  }

  private handleFrame(data: Buffer): void {
    if (this.state !== SessionState.READING) return;

    const raw = ForceFrameProtocol.parseRawValue(data);
    if (raw === null) return;

    // Sub-millisecond wall clock, in seconds
    const hostTime = (performance.timeOrigin + performance.now()) / 1000;
    this.rawSamples.push({ hostTime, value: raw });
    this.forceSamples.push({ hostTime, value: this.calibration.convert(raw, this.baseline) });
  }

  private async doStopReading(meta: SessionMeta): Promise<string | null> {
    if (this.state !== SessionState.READING) {
      bleLogger.warn(`Cannot stop reading in state ${this.state}`, { deviceId: this.identity.id }, 'SESSION');
      return null;
    }

    this.transition(SessionState.STOPPING);
    this.meta = { ...meta };

    let saveError: unknown = null;
    let filePath: string | null = null;
    try {
      filePath = await this.recorder.save(this.rawSamples, this.forceSamples, this.meta);
    } catch (error) {
      saveError = error;
    }

    this.clearBuffers();
    this.transition(SessionState.ARMED);
    this.notifyStateChanged();

    if (saveError !== null) {
      bleLogger.error('Saving capture failed', { deviceId: this.identity.id, ...describeError(saveError) }, 'SESSION');
      throw saveError instanceof ArtifactWriteError ? saveError : new ArtifactWriteError('(unknown)', saveError);
    }
    return filePath;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Disconnect & Recovery
  // ───────────────────────────────────────────────────────────────────────────

  private async doDisconnect(): Promise<boolean> {
    if (this.state === SessionState.IDLE) {
      return true;
    }

    this.intentionalDisconnect = true;
    try {
      this.transition(SessionState.DISCONNECTING_INTENTIONAL);
      this.notifyStateChanged();

      await this.releaseLink('disconnect', true);
      this.clearBuffers();

      this.transition(SessionState.IDLE);
      this.notifyStateChanged();
      bleLogger.logConnection(this.identity.id, this.identity.name, 'Disconnected');
    } finally {
      this.intentionalDisconnect = false;
    }
    return true;
  }

  /**
   * Transport-side link-lost signal. Only filters and re-dispatches; state is touched in the queue.
   */
  private handleLinkLostSignal(generation: number): void {
    if (this.intentionalDisconnect || generation !== this.linkGeneration) {
      bleLogger.debug('Ignoring expected link loss', { deviceId: this.identity.id, generation }, 'SESSION');
      return;
    }
    bleLogger.warn('Link lost', { deviceId: this.identity.id }, 'SESSION');
    this.queue.post('linkLost', () => this.recoverFromLinkLoss(generation));
  }

  private async recoverFromLinkLoss(generation: number): Promise<void> {
    if (this.intentionalDisconnect || generation !== this.linkGeneration || !this.link) {
      return;
    }

    // Error state is visible to observers before the save decision is made
    this.linkError = true;
    this.transition(SessionState.DISCONNECTING_ERROR);
    this.notifyStateChanged();

    await this.releaseLink('link lost');

    try {
      if (this.rawSamples.length > 0 && await this.askToSave()) {
        await this.saveRecovered();
      } else {
        bleLogger.info('Discarding partial capture', { deviceId: this.identity.id, samples: this.rawSamples.length }, 'SESSION');
      }
    } finally {
      this.clearBuffers();
      this.transition(SessionState.IDLE);
      this.notifyStateChanged();
    }
  }

  private async askToSave(): Promise<boolean> {
    const confirmSave = this.capabilities.confirmSave;
    if (!confirmSave) return true;

    try {
      return await withTimeout(
        confirmSave(this.identity.id, this.identity.name),
        this.timing.promptTimeoutMs,
        'Save confirmation timeout'
      );
    } catch (error) {
      bleLogger.warn('Save confirmation failed, saving', { deviceId: this.identity.id, ...describeError(error) }, 'SESSION');
      return true;
    }
  }

  private async saveRecovered(): Promise<void> {
    const meta = this.meta ?? DEFAULT_SESSION_META;
    try {
      const filePath = await this.recorder.save(this.rawSamples, this.forceSamples, meta);
      bleLogger.info('Recovered capture saved', { deviceId: this.identity.id, filePath }, 'SESSION');
    } catch (error) {
      bleLogger.error('Recovered capture could not be saved', { deviceId: this.identity.id, ...describeError(error) }, 'SESSION');
      this.capabilities.onRecoveryError?.({ ...this.identity }, error);
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Helpers
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Give up the current link, best-effort. The generation moves on first, so the
   * link-lost event the close itself causes is recognised as stale.
   */
  private async releaseLink(reason: string, unsubscribe: boolean = false): Promise<void> {
    const link = this.link;
    this.link = null;
    this.linkGeneration++;
    if (!link) return;

    if (unsubscribe && link.isConnected) {
      try {
        await this.transport.unsubscribe(link, this.channelId);
      } catch (error) {
        bleLogger.warn(`Unsubscribe failed (${reason})`, { deviceId: this.identity.id, ...describeError(error) }, 'SESSION');
      }
    }

    try {
      await this.transport.close(link);
    } catch (error) {
      bleLogger.warn(`Close failed (${reason})`, { deviceId: this.identity.id, ...describeError(error) }, 'SESSION');
    }
  }

  private clearBuffers(): void {
    this.rawSamples = [];
    this.forceSamples = [];
    this.meta = null;
  }

  private transition(next: SessionState): void {
    const previous = this.state;
    if (!SESSION_TRANSITION_RULES[previous].includes(next)) {
      throw new InvalidTransitionError(this.identity.id, previous, next);
    }
    this.state = next;
    bleLogger.logSessionState(this.identity.id, previous, next);
  }

  private notifyStateChanged(): void {
    const listener = this.capabilities.onStateChanged;
    if (!listener) return;
    try {
      listener();
    } catch (error) {
      bleLogger.warn('State change listener threw', { deviceId: this.identity.id, ...describeError(error) }, 'SESSION');
    }
  }
}
