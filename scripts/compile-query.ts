#!/usr/bin/env tsx
/**
 * Compile a /query command from the command line.
 *
 * Usage:
 *   npm run compile-query -- /query AGE DTN -filter "AND(AGE>=50, SEX==MALE)" -stats -distribution DTN:12:0:120
 */

import 'dotenv/config';

import { getDefaultAliasRegistry, loadAliasRegistry } from '../src/aliases/AliasRegistry.js';
import { loadCompilerConfig } from '../src/config/compiler.js';
import { parseMetricRequest } from '../src/query/MetricSpecBuilder.js';
import { compileQuery } from '../src/query/QueryCompiler.js';
import { QueryCompilerError } from '../src/query/QueryCompilerError.js';

function main(): void {
  const command = process.argv.slice(2).join(' ').trim();

  if (!command) {
    console.log('Usage:');
    console.log(
      '  npm run compile-query -- /query AGE DTN -filter "AND(AGE>=50, SEX==MALE)" -stats -distribution DTN:12:0:120 -group FIRST_CONTACT_PLACE'
    );
    process.exit(1);
  }

  const compilerConfig = loadCompilerConfig();
  const registry = compilerConfig.aliasDirectory
    ? loadAliasRegistry({ directory: compilerConfig.aliasDirectory })
    : getDefaultAliasRegistry();

  const request = parseMetricRequest(command, registry, { strict: compilerConfig.strictLexing });
  const query = compileQuery({
    metrics: request.metrics.metrics,
    filter: request.filter,
    groupBy: request.metrics.groupBy,
    timeWindow: { startDate: compilerConfig.startDate, endDate: compilerConfig.endDate },
    dataOrigin: { providerGroupIds: compilerConfig.providerGroupIds },
    includeGeneralStats: compilerConfig.includeGeneralStats,
  });

  console.log(query);
}

try {
  main();
} catch (err) {
  console.error('\n❌ Compilation failed:');

  if (err instanceof QueryCompilerError) {
    console.error(`${err.name} (${err.stage}): ${err.message}`);
    if (err.hint) {
      console.error(`\n💡 Hint: ${err.hint}`);
    }
  } else if (err instanceof Error) {
    console.error('Message:', err.message);
  } else {
    console.error(err);
  }

  process.exit(1);
}
