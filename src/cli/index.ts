#!/usr/bin/env node
/**
 * Vaultsmith CLI
 *
 * Declarative reconciliation of Vault secrets engines, PKI and generated secrets
 */

import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { Command, type OptionValues } from 'commander'
import { formatErrorForCli, isVaultsmithError } from '../lib/errors.js'
import { runApply } from './commands/apply.js'
import { runValidate } from './commands/validate.js'
import { parsePositiveInt, toCliArgs } from './lib/args.js'
import { EXIT_FAILURE, EXIT_OK, exitCodeFor } from './lib/exit-codes.js'
import * as ui from './ui.js'

// Version is injected at build time or read from package.json
const VERSION = process.env.VAULTSMITH_VERSION || getPackageVersion() || '0.0.0'

function getPackageVersion(): string | undefined {
  // Walk up from dist/cli or src/cli to the package root
  let dir = path.dirname(fileURLToPath(import.meta.url))
  for (let i = 0; i < 5; i++) {
    const pkgPath = path.join(dir, 'package.json')
    if (fs.existsSync(pkgPath)) {
      const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version
      }
      return undefined
    }
    dir = path.dirname(dir)
  }
  return undefined
}

/**
 * Run a command body and translate its outcome into process.exitCode
 */
async function run(verbose: boolean, body: () => Promise<number>): Promise<void> {
  try {
    process.exitCode = await body()
  } catch (error) {
    ui.progress(formatErrorForCli(error))
    if (verbose && isVaultsmithError(error) && error.context) {
      ui.verbose(JSON.stringify(error.context), true)
    }
    process.exitCode = exitCodeFor(error)
  }
}

const program = new Command()

program
  .name('vaultsmith')
  .description('Declarative reconciliation of Vault secrets engines, PKI and generated secrets')
  .version(VERSION)

program
  .command('apply')
  .description('Reconcile the resources declared in the manifests against Vault')
  .requiredOption('-f, --file <pattern...>', 'manifest files, directories or globs (- reads stdin)')
  .option('-r, --recursive', 'search directories recursively', false)
  .option('-c, --concurrency <n>', 'maximum Vault calls in flight', parsePositiveInt)
  .option('--config <path>', 'config file (default: nearest .vaultsmith/config.yaml)')
  .option('--json', 'print the result as JSON on stdout', false)
  .option('-v, --verbose', 'trace Vault requests', false)
  .action((opts: OptionValues) => {
    const args = toCliArgs(opts)
    const controller = new AbortController()
    const onSigint = () => {
      ui.warn('Interrupted, cancelling resources not yet started')
      controller.abort()
    }
    process.once('SIGINT', onSigint)

    return run(args.verbose, async () => {
      try {
        const result = await runApply({ args, signal: controller.signal })
        return result.success ? EXIT_OK : EXIT_FAILURE
      } finally {
        process.removeListener('SIGINT', onSigint)
      }
    })
  })

program
  .command('validate')
  .description('Check manifests and their references without contacting Vault')
  .requiredOption('-f, --file <pattern...>', 'manifest files, directories or globs (- reads stdin)')
  .option('-r, --recursive', 'search directories recursively', false)
  .option('--json', 'print resources and external references as JSON', false)
  .action((opts: OptionValues) => {
    const args = toCliArgs(opts)
    return run(args.verbose, async () => {
      await runValidate({ args })
      return EXIT_OK
    })
  })

await program.parseAsync()
