#!/usr/bin/env node
import { config } from 'dotenv';
import { resolve } from 'path';
import * as readline from 'readline';

// Load .env from the working directory before anything reads process.env
config({ path: resolve(process.cwd(), '.env') });

import { bleLogger, describeError, DeviceIdentity } from '../ble-bridge';
import { SessionState } from '../ble-management';
import { DEFAULT_SESSION_META, SessionMeta } from '../forceProcessing/recording';
import { loadAppConfig } from '../shared/config';
import { ForceBridgeApp } from './ForceBridgeApp';
import { ApiResponse } from './types';

const HELP = [
  'Commands:',
  '  scan                           discover sensors',
  '  connect <n> [n...]             connect sensors by number from the last scan',
  '  disconnect <n> [n...]          disconnect sensors',
  '  start [athlete] [cm] [kg]      start reading on all armed sensors',
  '  stop                           stop reading and save',
  '  status                         show sessions',
  '  quit                           save running captures, disconnect and exit',
].join('\n');

const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

// Lines answer a pending save question first; otherwise they are commands, run one at a time
const pendingAnswers: Array<(answer: string) => void> = [];
let commandChain: Promise<void> = Promise.resolve();
let lastScan: DeviceIdentity[] = [];
let lastMeta: SessionMeta = { ...DEFAULT_SESSION_META };
let shuttingDown = false;
const renderedStates = new Map<string, SessionState>();

const appConfig = loadAppConfig();
const bridge = new ForceBridgeApp(appConfig, {
  capabilities: {
    confirmSave: askToSave,
    onStateChanged: renderStateChanges,
    onRecoveryError: (identity, error) => {
      print(`!! Could not save data from ${identity.name}: ${describeError(error).error}`);
    },
  },
});

function print(line: string): void {
  process.stdout.write(`${line}\n`);
}

function askToSave(deviceId: string, deviceName?: string): Promise<boolean> {
  print(`\n!! ${deviceName ?? deviceId} disconnected unexpectedly. Save the partial reading? [Y/n]`);
  return new Promise(resolveAnswer => {
    pendingAnswers.push(answer => resolveAnswer(!/^n(o)?$/i.test(answer.trim())));
  });
}

function renderStateChanges(): void {
  for (const snapshot of bridge.getSnapshots()) {
    const previous = renderedStates.get(snapshot.identity.id);
    if (previous === snapshot.state) continue;
    renderedStates.set(snapshot.identity.id, snapshot.state);

    const marker = snapshot.linkError ? '[ERROR]' : snapshot.isConnected ? '[OK]' : '[--]';
    print(`${marker} ${snapshot.identity.name}: ${snapshot.state}`);
  }
}

function report(response: ApiResponse<unknown>): void {
  print(`${response.success ? 'OK' : 'FAILED'}: ${response.message}`);
}

function selectDevices(args: string[]): string[] | null {
  const ids: string[] = [];
  for (const arg of args) {
    const index = Number(arg) - 1;
    const device = Number.isInteger(index) ? lastScan[index] : undefined;
    if (!device) {
      print(`Unknown device number "${arg}" (run scan first)`);
      return null;
    }
    ids.push(device.id);
  }
  return ids;
}

function parseMeta(args: string[]): SessionMeta | null {
  const [athleteId = lastMeta.athleteId, cm = String(lastMeta.distanceCm), kg = String(lastMeta.weightKg)] = args;
  const distanceCm = Number(cm);
  const weightKg = Number(kg);
  if (!Number.isFinite(distanceCm) || !Number.isFinite(weightKg)) {
    print('Distance and weight must be numbers');
    return null;
  }
  return { athleteId, distanceCm, weightKg };
}

async function handleCommand(line: string): Promise<void> {
  const [command = '', ...args] = line.trim().split(/\s+/);

  switch (command.toLowerCase()) {
    case '':
      return;

    case 'help':
      print(HELP);
      return;

    case 'scan': {
      print(`Scanning for "${appConfig.deviceFilter}"...`);
      const response = await bridge.scan();
      report(response);
      lastScan = response.data ?? [];
      lastScan.forEach((device, i) => print(`  ${i + 1}. ${device.name} (${device.id})`));
      return;
    }

    case 'connect': {
      const ids = selectDevices(args);
      if (!ids || ids.length === 0) return;
      print('Connecting (baseline takes a few seconds, keep the sensors unloaded)...');
      report(await bridge.connect(ids));
      return;
    }

    case 'disconnect': {
      const ids = selectDevices(args);
      if (!ids || ids.length === 0) return;
      report(await bridge.disconnect(ids));
      return;
    }

    case 'start': {
      const meta = parseMeta(args);
      if (!meta) return;
      lastMeta = meta;
      report(await bridge.startReading(meta));
      return;
    }

    case 'stop': {
      const response = await bridge.stopReading(lastMeta);
      report(response);
      for (const result of response.data ?? []) {
        print(`  ${result.deviceId}: ${result.error ? result.error.message : result.value ?? 'nothing to save'}`);
      }
      return;
    }

    case 'status': {
      const status = bridge.getStatus();
      print(`Transport: ${status.transport}`);
      if (status.sessions.length === 0) print('  no sessions');
      for (const s of status.sessions) {
        print(`  ${s.identity.name}: ${s.state} baseline=${s.baseline} samples=${s.sampleCount}${s.linkError ? ' (link error)' : ''}`);
      }
      return;
    }

    case 'quit':
    case 'exit':
      rl.close();
      return;

    default:
      print(`Unknown command "${command}". Type help.`);
  }
}

async function shutdown(): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;

  // Unanswered save questions default to saving
  for (const answer of pendingAnswers.splice(0)) {
    answer('y');
  }

  try {
    await commandChain;
    await bridge.shutdown();
  } catch (error) {
    bleLogger.error('Shutdown failed', describeError(error), 'APP');
    process.exitCode = 1;
  }
  process.exit();
}

async function main(): Promise<void> {
  const ready = await bridge.initialize();
  report(ready);
  if (!ready.success) {
    process.exit(1);
  }

  print(HELP);
  rl.on('line', line => {
    const answer = pendingAnswers.shift();
    if (answer) {
      answer(line);
      return;
    }
    commandChain = commandChain
      .then(() => handleCommand(line))
      .catch(error => print(`Error: ${describeError(error).error}`));
  });
  rl.on('close', () => {
    void shutdown();
  });
}

main().catch(error => {
  bleLogger.error('Fatal error', describeError(error), 'APP');
  process.exit(1);
});
