/**
 * Desktop Provider Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { access, readFile } from 'node:fs/promises';
import { DesktopHealthProvider } from './desktop-health-provider.js';
import { DesktopExtrasProvider } from './desktop-extras-provider.js';
import { DesktopCameraProvider, parseCameraList } from './desktop-camera-provider.js';
import { LaunchctlActionProvider } from './launchctl-action-provider.js';
import { runCommand } from '../system/command.js';

vi.mock('node:fs/promises', () => ({
  readFile: vi.fn(),
  rm: vi.fn(),
  access: vi.fn(),
  constants: { X_OK: 1 },
}));

vi.mock('node:os', () => ({
  cpus: vi.fn(() => []),
  freemem: vi.fn(() => 1_000),
  hostname: vi.fn(() => 'studio-mac'),
  loadavg: vi.fn(() => [0, 0, 0]),
  tmpdir: vi.fn(() => '/tmp'),
  totalmem: vi.fn(() => 4_000),
  uptime: vi.fn(() => 1234),
}));

vi.mock('../system/command.js', () => ({
  runCommand: vi.fn(),
}));

const mockRunCommand = vi.mocked(runCommand);

const CAMERA_JSON = JSON.stringify({
  SPCameraDataType: [
    { _name: 'FaceTime HD Camera', 'spcamera_unique-id': 'cam-0001' },
    { _name: 'USB Camera' },
  ],
});

describe('Desktop Providers', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('DesktopHealthProvider', () => {
    it('should read memory from vm_stat', async () => {
      mockRunCommand.mockResolvedValue('Mach Virtual Memory Statistics: (page size of 4 bytes)\nPages free: 100.\nPages inactive: 150.\n');

      await expect(new DesktopHealthProvider().collectMemory()).resolves.toEqual({
        total: 4_000,
        available: 1_000,
        used: 3_000,
      });
      expect(mockRunCommand).toHaveBeenCalledWith('vm_stat', [], { timeoutMs: undefined });
    });

    it('should fall back to os memory when vm_stat fails', async () => {
      mockRunCommand.mockRejectedValue(new Error('vm_stat: not found'));

      await expect(new DesktopHealthProvider().collectMemory()).resolves.toEqual({
        total: 4_000,
        available: 1_000,
        used: 3_000,
      });
    });

    it('should read uptime from the OS', async () => {
      await expect(new DesktopHealthProvider().collectUptime()).resolves.toEqual({ seconds: 1234 });
    });

    it('should report its provider name', () => {
      expect(new DesktopHealthProvider().name).toBe('desktop');
    });
  });

  describe('DesktopExtrasProvider', () => {
    it('should report host details and null for failed commands', async () => {
      mockRunCommand.mockImplementation(async file => {
        if (file === 'sysctl') return 'Mac14,3\n';
        throw new Error('sw_vers failed');
      });

      await expect(new DesktopExtrasProvider(500).collectExtras()).resolves.toEqual({
        hostname: 'studio-mac',
        hardwareModel: 'Mac14,3',
        osVersion: null,
        cpuTemperatureC: null,
        thermalPressure: null,
        cpuSpeedLimitPercent: null,
        cpuThrottled: null,
      });
    });

    it('should report thermal state from pmset and smctemp', async () => {
      vi.mocked(access).mockResolvedValue(undefined);
      mockRunCommand.mockImplementation(async (file, args) => {
        if (file === 'pmset') return 'Note: No thermal warning level has been recorded\nCPU_Speed_Limit \t= 80\n';
        if (file === '/opt/homebrew/bin/smctemp' && args?.[0] === '-c') return '+61.5°C\n';
        return 'value\n';
      });

      const extras = await new DesktopExtrasProvider(500, ['/opt/homebrew/bin']).collectExtras();

      expect(extras).toMatchObject({
        cpuTemperatureC: 61.5,
        thermalPressure: 'nominal',
        cpuSpeedLimitPercent: 80,
        cpuThrottled: true,
      });
      expect(mockRunCommand).toHaveBeenCalledWith('pmset', ['-g', 'therm'], { timeoutMs: 500 });
    });
  });

  describe('DesktopCameraProvider', () => {
    it('should parse system_profiler camera output', () => {
      expect(parseCameraList(CAMERA_JSON)).toEqual([
        { id: 'cam-0001', name: 'FaceTime HD Camera' },
        { id: 'USB Camera', name: 'USB Camera' },
      ]);
      expect(parseCameraList('{"SPCameraDataType": "none"}')).toEqual([]);
    });

    it('should list cameras', async () => {
      mockRunCommand.mockResolvedValue(CAMERA_JSON);

      const info = await new DesktopCameraProvider(['/opt/homebrew/bin']).getCameraInfo();

      expect(info.available).toBe(true);
      expect(info.devices).toHaveLength(2);
    });

    it('should report no camera when listing fails', async () => {
      mockRunCommand.mockRejectedValue(new Error('system_profiler timed out'));

      await expect(new DesktopCameraProvider(['/opt/homebrew/bin']).getCameraInfo()).resolves.toEqual({
        available: false,
        devices: [],
      });
    });

    it('should capture a still with imagesnap', async () => {
      vi.mocked(access).mockResolvedValue(undefined);
      vi.mocked(readFile).mockResolvedValue(Buffer.from('jpeg-bytes'));
      mockRunCommand.mockResolvedValue('');

      const image = await new DesktopCameraProvider(['/opt/homebrew/bin'], 500).captureImage();

      expect(image.toString()).toBe('jpeg-bytes');
      const [file, args] = mockRunCommand.mock.calls[0] ?? [];
      expect(file).toBe('/opt/homebrew/bin/imagesnap');
      expect(args?.slice(0, 3)).toEqual(['-q', '-w', '1']);
      expect(args?.[3]).toMatch(/^\/tmp\/camera-\d+\.jpg$/);
    });

    it('should fail when imagesnap is not installed', async () => {
      vi.mocked(access).mockRejectedValue(new Error('ENOENT'));

      await expect(new DesktopCameraProvider(['/opt/homebrew/bin']).captureImage()).rejects.toThrow(
        'imagesnap not found in /opt/homebrew/bin',
      );
    });
  });

  describe('LaunchctlActionProvider', () => {
    it('should read the service state from launchctl print', async () => {
      mockRunCommand.mockResolvedValue('com.example.kiosk = {\n\tactive count = 1\n\tstate = running\n}\n');

      await expect(new LaunchctlActionProvider(501).getServiceStatus('com.example.kiosk')).resolves.toEqual({
        service: 'com.example.kiosk',
        running: true,
        detail: 'running',
      });
      expect(mockRunCommand).toHaveBeenCalledWith('launchctl', ['print', 'gui/501/com.example.kiosk'], {
        timeoutMs: undefined,
      });
    });

    it('should report an unloaded service as not running', async () => {
      mockRunCommand.mockRejectedValue(new Error('Could not find service'));

      await expect(new LaunchctlActionProvider(501).getServiceStatus('com.example.kiosk')).resolves.toEqual({
        service: 'com.example.kiosk',
        running: false,
        detail: 'not loaded',
      });
    });

    it('should kickstart the service on restart', async () => {
      mockRunCommand.mockResolvedValueOnce('').mockResolvedValueOnce('\tstate = running\n');

      const status = await new LaunchctlActionProvider(501, 500).restartService('com.example.kiosk');

      expect(mockRunCommand).toHaveBeenNthCalledWith(1, 'launchctl', ['kickstart', '-k', 'gui/501/com.example.kiosk'], {
        timeoutMs: 500,
      });
      expect(status.running).toBe(true);
    });
  });
});
