import { resolve } from 'node:path';
import { loadConfig } from '@crosscheck/schemas/src/config-loader.js';
import { createCrosscheckRuntime } from '@crosscheck/core/src/infrastructure/crosscheck-runtime.js';

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const clearIndex = args.indexOf('--clear');
  const configDir = resolve(process.cwd(), process.env['CROSSCHECK_CONFIG_DIR'] ?? 'config');

  const config = await loadConfig(configDir);
  const { service } = createCrosscheckRuntime(config);

  if (clearIndex >= 0) {
    const source = args[clearIndex + 1];
    const removed = await service.cacheClear(source);
    console.log(`Removed ${String(removed)} entr${removed === 1 ? 'y' : 'ies'}${source ? ` for ${source}` : ''}\n`);
  }

  const status = await service.cacheStatus();
  console.log(`Store: ${config.settings.cache.durableStore}`);
  console.log(`Entries: ${String(status.entryCounts.volatile)} volatile, ${String(status.entryCounts.durable)} durable`);
  console.log(`Size: ${String(status.sizes.volatile)} B volatile, ${String(status.sizes.durable)} B durable`);

  const sources = Object.entries(status.bySource);
  if (sources.length > 0) {
    console.log('\nBy source:');
    for (const [sourceTag, stats] of sources) {
      const age = status.oldestAgePerSource[sourceTag];
      console.log(
        `  ${sourceTag}: ${String(stats.entries)} entries, ${String(stats.sizeBytes)} B` +
          (age === undefined ? '' : `, oldest ${String(age)}s`),
      );
    }
  }
}

main().catch((error: unknown) => {
  console.error('Cache status failed:', error);
  process.exit(1);
});
