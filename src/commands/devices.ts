/**
 * Devices Command
 * Lists Spotify Connect devices and moves playback between them
 */

import { Command } from 'commander';
import { getPlugin } from '../lib/plugin-client.js';
import { printSuccess, printTable, runCommand } from '../lib/output.js';
import type { Device } from '../types/api.js';

function deviceView(device: Device): Record<string, unknown> {
  return {
    id: device.id,
    name: device.name,
    type: device.type,
    active: device.is_active,
    restricted: device.is_restricted,
    volume: device.volume_percent,
  };
}

export function createDevicesCommand(): Command {
  const devicesCommand = new Command('devices').description('Spotify Connect devices');

  devicesCommand
    .command('list')
    .description('List available devices')
    .action(async (_options: unknown, cmd: Command) => {
      await runCommand(cmd, async ({ format, quiet }) => {
        const devices = await getPlugin().api.getDevices();
        printSuccess(format, { count: devices.length, devices: devices.map(deviceView) }, () => {
          if (devices.length === 0) {
            console.log('No devices found, open Spotify on one first');
            return;
          }
          printTable(
            ['', 'Name', 'Type', 'Volume', 'ID'],
            devices.map((device) => [
              device.is_active ? '▶' : '',
              device.name,
              device.type,
              device.volume_percent === null ? '-' : `${device.volume_percent}%`,
              device.id ?? '-',
            ])
          );
          if (!quiet) {
            console.log(`\n${devices.length} device(s)`);
          }
        });
      });
    });

  devicesCommand
    .command('use <device>')
    .description('Move playback to a device (id or name)')
    .action(async (target: string, _options: unknown, cmd: Command) => {
      await runCommand(cmd, async ({ format }) => {
        const device = await getPlugin().player.selectDevice(target);
        printSuccess(format, { device: deviceView(device) }, () => {
          console.log(`Playing on ${device.name}`);
        });
      });
    });

  return devicesCommand;
}
