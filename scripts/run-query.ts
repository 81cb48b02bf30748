import { resolve } from 'node:path';
import { loadConfig } from '@crosscheck/schemas/src/config-loader.js';
import { createQueryParams } from '@crosscheck/schemas/src/query.schema.js';
import { createCrosscheckRuntime } from '@crosscheck/core/src/infrastructure/crosscheck-runtime.js';

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const isEntity = args.includes('--entity');
  const positional = args.filter((arg) => !arg.startsWith('--'));
  const query = positional[0] ?? 'Gazprom';
  const configDir = positional[1] ?? resolve(process.cwd(), process.env['CROSSCHECK_CONFIG_DIR'] ?? 'config');

  console.log('=== Crosscheck Query Runner ===\n');
  console.log(`Config directory: ${configDir}`);
  console.log(`Query: ${query}${isEntity ? ' (entity)' : ''}\n`);

  const config = await loadConfig(configDir);
  const { service } = createCrosscheckRuntime(config);

  const result = await service.aggregate(createQueryParams({ query, isEntity }));

  if (result.entity) {
    console.log('--- Entity ---');
    console.log(`  ${result.entity.matchedLabel ?? result.entity.originalQuery} (${result.entity.tier})`);
    console.log(`  Confidence: ${String(result.entity.confidence)}\n`);
  }

  console.log(`--- Findings (${result.queryKind}) ---`);
  for (const finding of result.findings) {
    console.log(`  ${finding.subject} ${finding.attribute} = ${String(finding.value)}`);
    console.log(`    ${finding.status}, ${finding.confidence}, sources: ${finding.sources.join(', ')}`);
  }

  console.log('\n--- Confidence ---');
  console.log(`  ${result.confidence.label} (${String(result.confidence.score)})`);
  console.log(`  ${result.confidence.reasoning}`);

  console.log('\n--- Sources ---');
  for (const consulted of result.sourcesConsulted) {
    console.log(`  + ${consulted.sourceId} ${String(consulted.recordCount)} record(s)${consulted.fromCache ? ' [cache]' : ''}`);
  }
  for (const skipped of result.sourcesSkipped) {
    console.log(`  - ${skipped.sourceId} (${skipped.reason}): ${skipped.explanation}`);
  }

  if (result.suggestions.length > 0) {
    console.log('\n--- Suggestions ---');
    for (const suggestion of result.suggestions) {
      console.log(`  - ${suggestion}`);
    }
  }

  console.log(`\nCompleted in ${String(result.durationMs)}ms${result.degraded ? ' (degraded)' : ''}`);
}

main().catch((error: unknown) => {
  console.error('Query failed:', error);
  process.exit(1);
});
