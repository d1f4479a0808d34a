#!/usr/bin/env node

import { Command } from 'commander'
import { realpathSync } from 'node:fs'
import { pathToFileURL } from 'node:url'
import process from 'node:process'

import { commandInstall, commandList, commandRemove, commandUpdate } from './commands.js'

export function createProgram(): Command {
  const program = new Command().name('meterline').description('meterline cost analysis')

  const plugin = program.command('plugin').description('Install and manage cost-source plugins')

  plugin
    .command('install')
    .description('Install a plugin from the registry or from owner/repo')
    .argument('<specifier>', 'name[@version], owner/repo[@version] or a github.com URL')
    .option('--force', 'Reinstall even if the version is already installed')
    .option('--clean', 'Remove other installed versions after a successful install')
    .option('--no-fallback', 'Fail instead of falling back to an older compatible release')
    .option('--metadata <pair...>', 'Plugin metadata as key=value (repeatable)')
    .option('--plugin-dir <path>', 'Override plugin directory (default: ~/.meterline/plugins)')
    .action(
      async (
        specifier: string,
        opts: {
          force?: boolean
          clean?: boolean
          fallback: boolean
          metadata?: string[]
          pluginDir?: string
        }
      ) => {
        await commandInstall(specifier, opts)
      }
    )

  plugin
    .command('list')
    .description('List installed plugins')
    .option('--all', 'Show every installed version instead of the latest')
    .option('--json', 'Emit JSON output')
    .option('--plugin-dir <path>', 'Override plugin directory (default: ~/.meterline/plugins)')
    .action(async (opts: { all?: boolean; json?: boolean; pluginDir?: string }) => {
      await commandList(opts)
    })

  plugin
    .command('update')
    .description('Update a plugin to its latest release')
    .argument('<name>', 'Installed plugin name')
    .option('--version <version>', 'Update to this version instead of the latest')
    .option('--dry-run', 'Show what would change without installing')
    .option('--plugin-dir <path>', 'Override plugin directory (default: ~/.meterline/plugins)')
    .action(
      async (name: string, opts: { version?: string; dryRun?: boolean; pluginDir?: string }) => {
        await commandUpdate(name, opts)
      }
    )

  plugin
    .command('remove')
    .description('Remove every installed version of a plugin')
    .argument('<name>', 'Installed plugin name')
    .option('--keep-config', 'Keep plugin.metadata.json files')
    .option('--plugin-dir <path>', 'Override plugin directory (default: ~/.meterline/plugins)')
    .action(async (name: string, opts: { keepConfig?: boolean; pluginDir?: string }) => {
      await commandRemove(name, opts)
    })

  return program
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv)
}

const isDirectRun = (() => {
  if (typeof process.argv[1] !== 'string') return false
  try {
    return import.meta.url === pathToFileURL(realpathSync(process.argv[1])).href
  } catch {
    return import.meta.url === pathToFileURL(process.argv[1]).href
  }
})()

if (isDirectRun) {
  runCli().catch((error) => {
    const message = error instanceof Error ? error.message : String(error)
    console.error(`error: ${message}`)
    process.exit(1)
  })
}
