/**
 * Display Bus
 *
 * Byte transport between the SSD1306 driver and the panel. The I2C
 * implementation drives /dev/i2c-<n> through i2ctransfer from i2c-tools.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { createSubsystemLogger, describeError } from '../../logging/subsystem.js';

const log = createSubsystemLogger('oled/bus');

export interface DisplayBus {
  writeCommands(commands: readonly number[]): Promise<void>;
  writeData(data: Buffer): Promise<void>;
  close(): Promise<void>;
}

/** Runs an executable without a shell and resolves with its stdout */
export type CommandRunner = (file: string, args: readonly string[]) => Promise<string>;

/** SSD1306 control bytes: the rest of the transfer is commands or GDDRAM data */
export const CONTROL_COMMAND = 0x00;
export const CONTROL_DATA = 0x40;

/** Data bytes per I2C message */
export const DATA_CHUNK_SIZE = 32;

/** i2ctransfer sends at most 42 messages in one I2C_RDWR call */
export const MAX_MESSAGES_PER_TRANSFER = 32;

export const I2C_TRANSFER = 'i2ctransfer';

const execFileAsync = promisify(execFile);

async function runCommand(file: string, args: readonly string[]): Promise<string> {
  const { stdout } = await execFileAsync(file, [...args], { encoding: 'utf8' });
  return stdout;
}

function hex(byte: number): string {
  return `0x${byte.toString(16).padStart(2, '0')}`;
}

/**
 * Arguments for one write message, e.g. `w3@0x3c 0x00 0xae 0xaf`
 */
export function writeMessageArgs(address: number, bytes: readonly number[]): string[] {
  return [`w${bytes.length}@${hex(address)}`, ...bytes.map(hex)];
}

/**
 * Addresses the panel at `address` on /dev/i2c-<busNumber>. Rejects when
 * i2ctransfer cannot be run.
 */
export async function openI2cDisplayBus(
  busNumber: number,
  address: number,
  run: CommandRunner = runCommand,
): Promise<DisplayBus> {
  try {
    await run(I2C_TRANSFER, ['-V']);
  } catch (error) {
    throw new Error(`${I2C_TRANSFER} is not available, install i2c-tools: ${describeError(error)}`);
  }
  log.debug('I2C bus opened', { busNumber, address: hex(address) });

  let closed = false;

  const transfer = async (messages: ReadonlyArray<readonly number[]>): Promise<void> => {
    if (closed) {
      throw new Error(`I2C bus ${busNumber} is closed`);
    }
    const args = ['-y', String(busNumber)];
    for (const message of messages) {
      args.push(...writeMessageArgs(address, message));
    }
    await run(I2C_TRANSFER, args);
  };

  return {
    async writeCommands(commands) {
      await transfer([[CONTROL_COMMAND, ...commands]]);
    },
    async writeData(data) {
      const messages: number[][] = [];
      for (let offset = 0; offset < data.length; offset += DATA_CHUNK_SIZE) {
        messages.push([CONTROL_DATA, ...data.subarray(offset, offset + DATA_CHUNK_SIZE)]);
      }
      for (let first = 0; first < messages.length; first += MAX_MESSAGES_PER_TRANSFER) {
        await transfer(messages.slice(first, first + MAX_MESSAGES_PER_TRANSFER));
      }
    },
    async close() {
      closed = true;
      log.debug('I2C bus closed', { busNumber });
    },
  };
}
