/**
 * Firmware merge tools
 * Expose the post-build merge hook over MCP
 */

import { z } from 'zod';
import { CONFIG } from '../config.js';
import { ErrorHandler, ExternalToolFailure } from '../utils/error-handler.js';
import { ResponseFormatter } from '../utils/formatter.js';
import { CommandExecutor } from '../utils/executor.js';
import { PackageToolLocator } from '../utils/tool-locator.js';
import { buildMergeCommand, createMergePlan, runMergeHook } from '../utils/merge-hook.js';
import { inspectArtifacts } from '../utils/artifact-inspector.js';
import type { CommandResult } from '../types.js';

// Schemas
export const MergeFirmwareSchema = z.object({
  build_dir: z.string().min(1).describe('Directory holding bootloader.bin, partitions.bin and firmware.bin'),
  python_path: z.string().min(1).optional().describe('Interpreter used to run esptool.py'),
  esptool_path: z.string().min(1).optional().describe('Path to esptool.py (default: PlatformIO tool-esptoolpy package)'),
  format: z.enum(['markdown', 'json']).default('markdown')
}).strict();

export const PreviewMergeCommandSchema = MergeFirmwareSchema;

export const CheckBuildArtifactsSchema = z.object({
  build_dir: z.string().min(1).describe('Directory holding the build outputs'),
  format: z.enum(['markdown', 'json']).default('markdown'),
  detail: z.enum(['concise', 'detailed']).default('concise')
}).strict();

type MergeArgs = z.infer<typeof MergeFirmwareSchema>;

function contextFrom(args: MergeArgs) {
  return {
    buildDir: args.build_dir,
    pythonPath: args.python_path ?? CONFIG.PYTHON_PATH,
    locator: new PackageToolLocator({ esptoolPath: args.esptool_path ?? CONFIG.ESPTOOL_PATH })
  };
}

/**
 * Run the hook with captured tool output. A failure carries the tool's stderr.
 */
async function runCapturedMerge(args: MergeArgs) {
  const captured: { tool?: CommandResult } = {};

  try {
    const result = await runMergeHook({
      ...contextFrom(args),
      runner: CommandExecutor.runner({ capture: true, onResult: r => { captured.tool = r; } }),
      log: line => console.error(line)
    });
    return { result, toolOutput: captured.tool?.stdout ?? '' };
  } catch (error) {
    if (error instanceof ExternalToolFailure && captured.tool) {
      throw new ExternalToolFailure(error.command, error.exitCode, captured.tool.stderr);
    }
    throw error;
  }
}

const buildDirProperties = {
  build_dir: {
    type: 'string' as const,
    description: 'Directory holding bootloader.bin, partitions.bin and firmware.bin'
  },
  python_path: {
    type: 'string' as const,
    description: 'Interpreter used to run esptool.py (default: PYTHONEXE or python3)'
  },
  esptool_path: {
    type: 'string' as const,
    description: 'Path to esptool.py (default: ESPTOOL_PATH or the PlatformIO tool-esptoolpy package)'
  },
  format: {
    type: 'string' as const,
    enum: ['markdown', 'json'],
    default: 'markdown',
    description: 'Output format'
  }
};

export const mergeTools = {
  merge_firmware: {
    description: `Merge an ESP32 build into a single flashable image.

Runs esptool merge_bin on bootloader.bin (0x1000), partitions.bin (0x8000) and firmware.bin (0x10000)
from the build directory and writes firmware_merged.bin next to them, replacing any previous one.
With format="json" a failure is reported as a JSON error object as well.

Examples:
- merge_firmware(build_dir=".pio/build/esp32dev")
- merge_firmware(build_dir="/work/build", python_path="/usr/bin/python3", esptool_path="/opt/esptool/esptool.py")`,
    inputSchema: {
      type: 'object' as const,
      properties: buildDirProperties,
      required: ['build_dir']
    },
    handler: async (rawArgs: unknown) => {
      const args = MergeFirmwareSchema.parse(rawArgs);

      if (args.format === 'json') {
        try {
          const { result, toolOutput } = await runCapturedMerge(args);
          return ResponseFormatter.format({ ...result, toolOutput }, 'json');
        } catch (error) {
          if (error instanceof ExternalToolFailure) {
            throw new Error(ResponseFormatter.format({
              status: 'failure',
              message: error.message,
              command: error.command,
              exitCode: error.exitCode,
              toolError: error.stderr
            }, 'json'));
          }
          throw error;
        }
      }

      return ErrorHandler.wrap(async () => {
        const { result } = await runCapturedMerge(args);
        return ResponseFormatter.success(`Merged image written to ${result.output}`, {
          command: result.command
        });
      });
    }
  },

  preview_merge_command: {
    description: `Show the esptool merge_bin command merge_firmware would run, without running it.

Examples:
- preview_merge_command(build_dir=".pio/build/esp32dev")`,
    inputSchema: {
      type: 'object' as const,
      properties: buildDirProperties,
      required: ['build_dir']
    },
    handler: async (rawArgs: unknown) => {
      const args = PreviewMergeCommandSchema.parse(rawArgs);

      return ErrorHandler.wrap(async () => {
        const plan = createMergePlan(contextFrom(args));
        const command = buildMergeCommand(plan);

        if (args.format === 'json') {
          return ResponseFormatter.format({ ...plan, command }, 'json');
        }
        return command;
      });
    }
  },

  check_build_artifacts: {
    description: `List the merge inputs and the merged output in a build directory, with sizes.

Use it to diagnose a failed merge: merge_firmware itself does not check its inputs.

Examples:
- check_build_artifacts(build_dir=".pio/build/esp32dev")
- check_build_artifacts(build_dir=".pio/build/esp32dev", format="json")
- check_build_artifacts(build_dir=".pio/build/esp32dev", detail="detailed") → Include byte sizes`,
    inputSchema: {
      type: 'object' as const,
      properties: {
        build_dir: buildDirProperties.build_dir,
        format: buildDirProperties.format,
        detail: {
          type: 'string' as const,
          enum: ['concise', 'detailed'],
          default: 'concise',
          description: 'Detail level (detailed adds byte sizes)'
        }
      },
      required: ['build_dir']
    },
    handler: async (rawArgs: unknown) => {
      const args = CheckBuildArtifactsSchema.parse(rawArgs);

      return ErrorHandler.wrap(async () => {
        const artifacts = await inspectArtifacts(args.build_dir);
        return ResponseFormatter.format(artifacts, args.format, args.detail);
      });
    }
  }
};
