/**
 * Interactive prompts for the restore command
 *
 * Every prompt accepts `q` or `quit` to abandon the whole run.
 */

import * as readline from 'readline';
import { UserAbortError, type Image, type RestoreType, type VolumeDescriptor } from '@ec2-restore/core';
import { printWarning } from '../core/io/cli-logger.js';

export interface Prompter {
  /** Ask a question and resolve with the trimmed answer */
  ask(question: string): Promise<string>;
  close(): void;
}

export class ReadlinePrompter implements Prompter {
  private readonly rl: readline.Interface;

  constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
    this.rl = readline.createInterface({ input, output });
  }

  ask(question: string): Promise<string> {
    return new Promise((resolve) => {
      this.rl.question(question, (answer) => {
        resolve(answer.trim());
      });
    });
  }

  close(): void {
    this.rl.close();
  }
}

export function isQuitInput(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'q' || normalized === 'quit';
}

export async function askOrQuit(prompter: Prompter, question: string): Promise<string> {
  const answer = await prompter.ask(question);
  if (isQuitInput(answer)) {
    throw new UserAbortError();
  }
  return answer;
}

export async function selectImage(prompter: Prompter, images: readonly Image[]): Promise<Image> {
  for (;;) {
    const answer = await askOrQuit(prompter, `Select AMI to restore from [1-${images.length}]: `);
    const index = Number(answer);
    const image = Number.isInteger(index) ? images[index - 1] : undefined;
    if (image) {
      return image;
    }
    printWarning(`Enter a number between 1 and ${images.length}, or q to quit`);
  }
}

export async function selectRestoreMode(prompter: Prompter): Promise<RestoreType> {
  for (;;) {
    const answer = (await askOrQuit(prompter, 'Select restore type (full/volume) [full]: ')).toLowerCase();
    if (answer === '' || answer === 'full') {
      return 'full';
    }
    if (answer === 'volume') {
      return 'volume';
    }
    printWarning('Enter full or volume, or q to quit');
  }
}

/**
 * Parse a device selection: `all`, or 1-based indices separated by commas.
 * Returns null when the input is malformed or out of range.
 */
export function parseDeviceSelection(answer: string, volumes: readonly VolumeDescriptor[]): string[] | null {
  if (answer.toLowerCase() === 'all') {
    return volumes.map(volume => volume.device);
  }
  const parts = answer.split(',').map(part => part.trim());
  const devices: string[] = [];
  for (const part of parts) {
    if (!/^\d+$/.test(part)) {
      return null;
    }
    const volume = volumes[Number(part) - 1];
    if (!volume) {
      return null;
    }
    if (!devices.includes(volume.device)) {
      devices.push(volume.device);
    }
  }
  return devices.length > 0 ? devices : null;
}

export async function selectDevices(prompter: Prompter, volumes: readonly VolumeDescriptor[]): Promise<string[]> {
  for (;;) {
    const answer = await askOrQuit(prompter, "Select volumes to restore (comma-separated indices or 'all'): ");
    const devices = parseDeviceSelection(answer, volumes);
    if (devices) {
      return devices;
    }
    printWarning(`Enter 'all' or indices between 1 and ${volumes.length}, e.g. 1,2`);
  }
}

export async function confirmStep(prompter: Prompter, message: string): Promise<boolean> {
  const answer = (await askOrQuit(prompter, `${message} [y/N]: `)).toLowerCase();
  return answer === 'y' || answer === 'yes';
}
