import { describe, it, expect, vi, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { mergeTools } from './merge.js';
import { CommandExecutor } from '../utils/executor.js';
import type { CommandResult } from '../types.js';

const COMMAND =
  '/usr/bin/python3 /tools/esptool.py --chip esp32 merge_bin -o "/build/esp32/firmware_merged.bin" ' +
  '0x1000 "/build/esp32/bootloader.bin" 0x8000 "/build/esp32/partitions.bin" 0x10000 "/build/esp32/firmware.bin"';

const args = {
  build_dir: '/build/esp32',
  python_path: '/usr/bin/python3',
  esptool_path: '/tools/esptool.py'
};

function stubTool(result: CommandResult) {
  return vi.spyOn(CommandExecutor, 'runner').mockImplementation((options = {}) => async () => {
    options.onResult?.(result);
    return result.exitCode;
  });
}

describe('mergeTools', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('preview_merge_command', () => {
    it('returns the command without running anything', async () => {
      const runner = vi.spyOn(CommandExecutor, 'runner');

      await expect(mergeTools.preview_merge_command.handler(args)).resolves.toBe(COMMAND);
      expect(runner).not.toHaveBeenCalled();
    });

    it('returns the plan as JSON', async () => {
      const text = await mergeTools.preview_merge_command.handler({ ...args, format: 'json' });

      expect(JSON.parse(text)).toEqual({
        buildDir: '/build/esp32',
        pythonPath: '/usr/bin/python3',
        toolPath: '/tools/esptool.py',
        artifacts: {
          bootloader: '/build/esp32/bootloader.bin',
          partitions: '/build/esp32/partitions.bin',
          app: '/build/esp32/firmware.bin'
        },
        output: '/build/esp32/firmware_merged.bin',
        command: COMMAND
      });
    });

    it('rejects unknown arguments', async () => {
      await expect(mergeTools.preview_merge_command.handler({ ...args, chip: 'esp32s3' })).rejects.toThrow();
    });
  });

  describe('merge_firmware', () => {
    it('runs the tool with captured output and reports the merged path', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const runner = stubTool({ stdout: 'Wrote 0x40000 bytes', stderr: '', exitCode: 0, success: true });

      const text = await mergeTools.merge_firmware.handler(args);

      expect(runner).toHaveBeenCalledWith(expect.objectContaining({ capture: true }));
      expect(text).toBe(
        `✅ **Success**: Merged image written to /build/esp32/firmware_merged.bin\n\n**Command**: ${COMMAND}`
      );
    });

    it('logs the command to stderr, keeping stdout for the protocol', async () => {
      const errorLog = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      stubTool({ stdout: '', stderr: '', exitCode: 0, success: true });

      await mergeTools.merge_firmware.handler(args);

      expect(errorLog).toHaveBeenCalledWith(`Merging ESP32 firmware: ${COMMAND}`);
    });

    it('returns JSON with the tool output', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      stubTool({ stdout: 'Wrote 0x40000 bytes', stderr: '', exitCode: 0, success: true });

      const text = await mergeTools.merge_firmware.handler({ ...args, format: 'json' });

      expect(JSON.parse(text)).toEqual({
        status: 'success',
        command: COMMAND,
        output: '/build/esp32/firmware_merged.bin',
        toolOutput: 'Wrote 0x40000 bytes'
      });
    });

    it('fails with the fixed message and the tool stderr on a non-zero exit', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      stubTool({ stdout: '', stderr: 'No such file or directory', exitCode: 2, success: false });

      const failure = mergeTools.merge_firmware.handler(args);

      await expect(failure).rejects.toThrow(
        '❌ **Error**: Failed to merge ESP32 binaries\nExit code: 2\nCommand: ' + COMMAND + '\nTool output: No such file or directory'
      );
    });
  });

  describe('merge_firmware failures with format json', () => {
    it('reports the failure as a JSON object', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      stubTool({ stdout: '', stderr: 'No such file or directory', exitCode: 2, success: false });

      const error = await mergeTools.merge_firmware.handler({ ...args, format: 'json' }).then(
        () => undefined,
        (e: unknown) => e
      );

      expect(error).toBeInstanceOf(Error);
      expect(JSON.parse(error instanceof Error ? error.message : '')).toEqual({
        status: 'failure',
        message: 'Failed to merge ESP32 binaries',
        command: COMMAND,
        exitCode: 2,
        toolError: 'No such file or directory'
      });
    });
  });

  describe('check_build_artifacts', () => {
    it('adds byte sizes in detailed mode', async () => {
      const buildDir = await fs.mkdtemp(path.join(os.tmpdir(), 'merge-tools-'));
      try {
        await fs.writeFile(path.join(buildDir, 'firmware.bin'), Buffer.alloc(100));

        const text = await mergeTools.check_build_artifacts.handler({ build_dir: buildDir, detail: 'detailed' });
        const lines = text.split('\n');

        expect(lines[0]).toBe('| Role | Path | Exists | Size Bytes | Size Human |');
        expect(lines[4]).toBe(`| app | ${path.join(buildDir, 'firmware.bin')} | ✓ | 100 | 100 B |`);
      } finally {
        await fs.rm(buildDir, { recursive: true, force: true });
      }
    });

    it('keeps to the concise columns by default', async () => {
      const text = await mergeTools.check_build_artifacts.handler({ build_dir: '/nonexistent-build-dir' });

      expect(text.split('\n')[0]).toBe('| Role | Path | Exists | Size Human |');
    });
  });
});
