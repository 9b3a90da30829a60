import 'dotenv/config';
import { generateTerrain } from './pipeline.js';
import { renderTerrain } from './render.js';
import { mkdir, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';

interface CliConfig {
  seed: string;
  width: number;
  height: number;
  chunkSize: number;
  maxAttempts: number;
  useThemes: boolean;
  output: string;
  print: boolean;
}

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) throw new Error(`${name} must be an integer, got "${raw}"`);
  return value;
}

function parseIntArg(flag: string, raw: string | undefined): number {
  const value = parseInt(raw ?? '', 10);
  if (Number.isNaN(value)) throw new Error(`${flag} expects an integer`);
  return value;
}

function parseArgs(argv: string[]): CliConfig {
  const args = argv.slice(2);
  const config: CliConfig = {
    seed: process.env.WORLD_SEED || `world-${Date.now()}`,
    width: 2,
    height: 2,
    chunkSize: intFromEnv('WORLD_CHUNK_SIZE', 8),
    maxAttempts: intFromEnv('WFC_MAX_ATTEMPTS', 100),
    useThemes: true,
    output: 'output/terrain.json',
    print: false,
  };

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--seed':
        config.seed = args[++i] ?? config.seed;
        break;
      case '--width':
        config.width = parseIntArg('--width', args[++i]);
        break;
      case '--height':
        config.height = parseIntArg('--height', args[++i]);
        break;
      case '--chunk-size':
        config.chunkSize = parseIntArg('--chunk-size', args[++i]);
        break;
      case '--max-attempts':
        config.maxAttempts = parseIntArg('--max-attempts', args[++i]);
        break;
      case '--no-themes':
        config.useThemes = false;
        break;
      case '--output':
        config.output = args[++i] ?? config.output;
        break;
      case '--print':
        config.print = true;
        break;
      default:
        throw new Error(`Unknown argument: ${args[i]}`);
    }
  }

  return config;
}

async function main() {
  const config = parseArgs(process.argv);
  const startTime = Date.now();

  console.log('=== Terrain Generation ===');
  console.log(`Seed: "${config.seed}"`);
  console.log(`Grid: ${config.width}x${config.height} chunks of ${config.chunkSize}x${config.chunkSize}`);
  console.log(`Output: ${config.output}`);
  console.log();

  const map = generateTerrain({
    seed: config.seed,
    chunksWide: config.width,
    chunksHigh: config.height,
    chunkSize: config.chunkSize,
    maxAttempts: config.maxAttempts,
    useThemes: config.useThemes,
  });

  const outputPath = resolve(config.output);
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, JSON.stringify(map, null, 2));

  if (config.print) {
    console.log();
    for (const row of renderTerrain(map)) console.log(row);
  }

  const elapsed = ((Date.now() - startTime) / 1000).toFixed(2);
  console.log();
  console.log('=== Generation Complete ===');
  console.log(`Dimensions: ${map.width}x${map.height} tiles`);
  console.log(`Themed chunks: ${map.themes.filter(t => t !== null).length}/${map.themes.length}`);
  console.log(`Time: ${elapsed}s`);
  console.log(`Output: ${outputPath}`);
}

main().catch((err: unknown) => {
  console.error('Generation failed:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
