import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';

import { encodePgm } from '../export/pgm.js';
import { getDefaultPlanformParams, getPlanformPreset, PLANFORM_PRESET_NAMES } from '../planform/defaults.js';
import { InvalidInputError } from '../planform/errors.js';
import { generatePlanform } from '../planform/generate.js';
import { createPlanformResolver } from '../planform/resolve.js';
import { summarizePlanform, type PlanformSummary } from '../planform/summary.js';
import type { Planform, PlanformParamKey } from '../planform/types.js';

export type CliIo = {
  log: (line: string) => void;
  error: (line: string) => void;
  cwd: string;
};

const defaultIo = (): CliIo => ({
  log: (line) => console.log(line),
  error: (line) => console.error(line),
  cwd: process.cwd(),
});

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const PARAM_FLAGS = new Map<string, PlanformParamKey>([
  ['--size', 'imageSizePx'],
  ['--cycles', 'cyclesPerImage'],
  ['--sigma', 'gaussianSpaceConstant'],
  ['--gray', 'grayScale'],
  ['--amplitude', 'amplitude'],
  ['--base-angle', 'baseAngleOffset'],
  ['--lattice-angle', 'latticeAngle'],
  ['--phase', 'phaseOffset'],
  ['--components', 'componentCount'],
]);

export type ParsedPlanformArgs = {
  params: Partial<Record<PlanformParamKey, number>>;
  config?: string;
  preset?: string;
  out?: string;
  json: boolean;
};

const printMainUsage = (io: CliIo) => {
  io.log(`planform – sinusoidal grating planform stimuli

Commands:
  defaults [--json]
  inspect [parameter flags] [--json]
  render --out <dir> [parameter flags] [--json]

Parameter flags:
  --config <file.json>     JSON record of planform parameters
  --preset <name>          One of: ${PLANFORM_PRESET_NAMES.join(', ')}
  --size <px>              Image side length (default 600)
  --cycles <n>             Cycles per image (default 12)
  --sigma <px>             Gaussian space constant (default 1800)
  --gray <value>           Gray scale ceiling (default 255)
  --amplitude <value>      Grating amplitude (default 1)
  --base-angle <rad>       Global rotation (default 0)
  --lattice-angle <rad>    Lattice angle (default atan2(1, 3))
  --phase <rad>            Second-pair phase, 4-component only (default 0)
  --components <4|6>       Lattice topology (default 4)

Precedence: preset < config file < flags.`);
};

const takeValue = (args: readonly string[], index: number, flag: string): string => {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new CliUsageError(`Flag ${flag} requires a value.`);
  }
  return value;
};

export const parsePlanformArgs = (args: readonly string[]): ParsedPlanformArgs => {
  const parsed: ParsedPlanformArgs = { params: {}, json: false };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const paramKey = PARAM_FLAGS.get(arg);
    if (paramKey) {
      const raw = takeValue(args, i, arg);
      const value = Number(raw);
      if (raw.trim() === '' || !Number.isFinite(value)) {
        throw new CliUsageError(`Flag ${arg} expects a number (received "${raw}").`);
      }
      parsed.params[paramKey] = value;
      i += 1;
      continue;
    }
    switch (arg) {
      case '--config':
        parsed.config = takeValue(args, i, arg);
        i += 1;
        break;
      case '--preset':
        parsed.preset = takeValue(args, i, arg);
        i += 1;
        break;
      case '--out':
        parsed.out = takeValue(args, i, arg);
        i += 1;
        break;
      case '--json':
        parsed.json = true;
        break;
      default:
        throw new CliUsageError(
          arg.startsWith('--') ? `Unknown flag ${arg}.` : `Unexpected argument "${arg}".`,
        );
    }
  }
  return parsed;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readConfigFile = async (path: string): Promise<Record<string, unknown>> => {
  const text = await readFile(path, 'utf8');
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidInputError(`Config file ${path} is not valid JSON: ${message}`);
  }
  if (!isRecord(payload)) {
    throw new InvalidInputError(`Config file ${path} must contain a JSON object`, [
      { field: '(root)', message: 'expected a planform parameter record' },
    ]);
  }
  return payload;
};

const buildPlanform = async (parsed: ParsedPlanformArgs, io: CliIo): Promise<Planform> => {
  const preset = parsed.preset ? getPlanformPreset(parsed.preset) : {};
  const fromFile = parsed.config ? await readConfigFile(resolve(io.cwd, parsed.config)) : {};
  const resolvePlanform = createPlanformResolver({ logger: { info: io.error } });
  const resolved = resolvePlanform({ ...preset, ...fromFile, ...parsed.params });
  return { ...resolved, images: generatePlanform(resolved) };
};

const formatSummary = (summary: PlanformSummary, digest: string): string[] => {
  const { params } = summary;
  const lines = [
    `planform ${params.componentCount}-component, ${params.imageSizePx}x${params.imageSizePx}px`,
    `  cycles/image ${params.cyclesPerImage} (${summary.cyclesPerPixel.toFixed(6)} cycles/px)`,
    `  lattice angle ${params.latticeAngle.toFixed(6)} rad, phase ${params.phaseOffset.toFixed(6)} rad`,
    `  digest ${digest}`,
  ];
  for (const [name, image] of Object.entries(summary.images)) {
    lines.push(
      `  ${name.padEnd(8)} min ${image.min.toFixed(3)}  max ${image.max.toFixed(3)}  mean ${image.mean.toFixed(3)}`,
    );
  }
  return lines;
};

const handleDefaults = (args: readonly string[], io: CliIo) => {
  const parsed = parsePlanformArgs(args);
  const defaults = getDefaultPlanformParams();
  if (parsed.json) {
    io.log(JSON.stringify(defaults, null, 2));
    return;
  }
  for (const [key, value] of Object.entries(defaults)) {
    io.log(`${key.padEnd(22)} ${value}`);
  }
};

const handleInspect = async (args: readonly string[], io: CliIo) => {
  const parsed = parsePlanformArgs(args);
  const planform = await buildPlanform(parsed, io);
  const { summary, json, digest } = summarizePlanform(planform, { indent: 2 });
  if (parsed.json) {
    io.log(json);
    return;
  }
  formatSummary(summary, digest).forEach((line) => io.log(line));
};

const handleRender = async (args: readonly string[], io: CliIo) => {
  const parsed = parsePlanformArgs(args);
  if (!parsed.out) {
    throw new CliUsageError('render requires --out <dir>.');
  }
  const outDir = resolve(io.cwd, parsed.out);
  const planform = await buildPlanform(parsed, io);
  await mkdir(outDir, { recursive: true });
  const written: string[] = [];
  for (const [name, grid] of Object.entries(planform.images)) {
    const filePath = join(outDir, `${name}.pgm`);
    await writeFile(filePath, encodePgm(grid, planform.grayScale));
    written.push(filePath);
  }
  const { json, digest } = summarizePlanform(planform, { indent: 2 });
  const summaryPath = join(outDir, 'planform.json');
  await writeFile(summaryPath, `${json}\n`, 'utf8');
  if (parsed.json) {
    io.log(JSON.stringify({ status: 'ok', digest, files: [...written, summaryPath] }, null, 2));
    return;
  }
  io.log(`[planform] wrote ${written.length} images to ${outDir}`);
  io.log(`[planform] digest ${digest}`);
};

/** Runs one CLI invocation and resolves to the process exit code. */
export const runPlanformCli = async (
  argv: readonly string[],
  io: CliIo = defaultIo(),
): Promise<number> => {
  const [command, ...rest] = argv;
  if (!command || command === '--help' || command === '-h') {
    printMainUsage(io);
    return 0;
  }
  try {
    switch (command) {
      case 'defaults':
        handleDefaults(rest, io);
        return 0;
      case 'inspect':
        await handleInspect(rest, io);
        return 0;
      case 'render':
        await handleRender(rest, io);
        return 0;
      default:
        throw new CliUsageError(`Unknown command "${command}".`);
    }
  } catch (error) {
    if (error instanceof InvalidInputError && error.issues.length > 0) {
      io.error(error.message);
      error.issues.forEach((issue) => io.error(`  • ${issue.field}: ${issue.message}`));
      return 1;
    }
    if (error instanceof Error) {
      io.error(error.message);
      return 1;
    }
    throw error;
  }
};
