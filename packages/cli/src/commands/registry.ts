/**
 * mediagate registry: Inspect and check media type registries
 *
 * Subcommands:
 *   mediagate registry list [--json]    entries of the active registry
 *   mediagate registry fingerprint      fingerprint of the active registry
 *   mediagate registry check <file>     validate a registry document
 *
 * Two nodes that print the same fingerprint reach the same verdict for
 * every input.
 */

import { Command } from 'commander';
import { buildRegistry, registryFingerprint } from '@mediagate/kernel';
import { readRegistryFile } from '@mediagate/runtime-host';
import { resolve } from 'node:path';
import { formatRegistryEntry, formatValidationErrors, registryToJson } from '../output/format.js';
import { t } from '../output/theme.js';
import { buildRuntime, describeSource } from '../runtime.js';
import type { GlobalOptions } from '../runtime.js';
import { EXIT_REJECTED, runCommand } from './run.js';

export const registryCommand = new Command('registry')
  .description('Inspect the active registry or check a registry document');

registryCommand
  .command('list')
  .description('List registry entries and their parameter policies')
  .option('--json', 'Output as JSON')
  .action((options: { json?: boolean }, command: Command) => {
    runCommand('registry list', () => {
      const { registry, source } = buildRuntime(command.optsWithGlobals<GlobalOptions>());
      const fingerprint = registryFingerprint(registry);

      if (options.json === true) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify(registryToJson(registry, fingerprint), null, 2));
        return;
      }

      // eslint-disable-next-line no-console
      console.log(`\n─── Registry ${t.muted(`(${describeSource(source)})`)}`);
      // eslint-disable-next-line no-console
      console.log(`Fingerprint: ${fingerprint}`);
      // eslint-disable-next-line no-console
      console.log(`Entries:     ${registry.size}\n`);
      for (const entry of registry.entries()) {
        for (const line of formatRegistryEntry(entry)) {
          // eslint-disable-next-line no-console
          console.log(line);
        }
      }
    });
  });

registryCommand
  .command('fingerprint')
  .description('Print the fingerprint of the active registry')
  .action((_options: Record<string, never>, command: Command) => {
    runCommand('registry fingerprint', () => {
      const { registry } = buildRuntime(command.optsWithGlobals<GlobalOptions>());
      // eslint-disable-next-line no-console
      console.log(registryFingerprint(registry));
    });
  });

registryCommand
  .command('check')
  .description('Validate a registry document without activating it')
  .argument('<file>', 'Path to a registry document (JSON)')
  .action((file: string) => {
    runCommand('registry check', () => {
      const path = resolve(file);
      const result = readRegistryFile(path);

      if (!result.ok) {
        // eslint-disable-next-line no-console
        console.log(`${t.red('invalid')}  ${path}`);
        for (const line of formatValidationErrors(result.errors)) {
          // eslint-disable-next-line no-console
          console.log(line);
        }
        process.exitCode = EXIT_REJECTED;
        return;
      }

      const registry = buildRegistry(result.value);
      // eslint-disable-next-line no-console
      console.log(`${t.green('valid')}  ${path}`);
      // eslint-disable-next-line no-console
      console.log(`  entries      ${registry.size}`);
      // eslint-disable-next-line no-console
      console.log(`  fingerprint  ${registryFingerprint(registry)}`);
    });
  });
