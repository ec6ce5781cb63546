/**
 * gantryctl config: where the CLI finds the dispatcher and how it prints
 */

import { Command } from 'commander';
import {
  CONFIG_KEYS,
  displayValue,
  getDefaultConfigPath,
  isConfigKey,
  resolveConfig,
  setConfigValue,
  unsetConfigValue,
  type ConfigKey,
} from '../utils/config-file.js';
import { createTable, error, errorMessage, info, output, success } from '../utils/output.js';
import { getGlobalOptions, type GlobalOptions } from '../cli.js';

export function configCommand(): Command {
  return new Command('config')
    .description('Manage CLI configuration')
    .addCommand(configSetCommand())
    .addCommand(configUnsetCommand())
    .addCommand(configGetCommand())
    .addCommand(configListCommand())
    .addCommand(configPathCommand());
}

/**
 * Exit unless the key is one gantryctl knows
 */
function requireKey(key: string, globalOpts: GlobalOptions): ConfigKey {
  if (!isConfigKey(key)) {
    error(`Unknown config key: ${key} (valid keys: ${CONFIG_KEYS.join(', ')})`, globalOpts);
    process.exit(1);
  }
  return key;
}

function configSetCommand(): Command {
  return new Command('set')
    .description('Store a configuration value')
    .argument('<key>', `Configuration key (${CONFIG_KEYS.join(', ')})`)
    .argument('<value>', 'Configuration value')
    .action((rawKey: string, value: string, _options: unknown, command: Command) => {
      const globalOpts = getGlobalOptions(command);
      const key = requireKey(rawKey, globalOpts);

      let problems: string[];
      try {
        problems = setConfigValue(key, value, globalOpts.config);
      } catch (err) {
        error(`Failed to set config: ${errorMessage(err)}`, globalOpts);
        process.exit(1);
      }

      if (problems.length > 0) {
        problems.forEach((problem) => error(problem, globalOpts));
        process.exit(1);
      }

      success(`Set ${key} = ${displayValue(key, value)}`, globalOpts);
    });
}

function configUnsetCommand(): Command {
  return new Command('unset')
    .description('Remove a stored configuration value')
    .argument('<key>', 'Configuration key')
    .action((rawKey: string, _options: unknown, command: Command) => {
      const globalOpts = getGlobalOptions(command);
      const key = requireKey(rawKey, globalOpts);

      try {
        if (unsetConfigValue(key, globalOpts.config)) {
          success(`Removed ${key}`, globalOpts);
        } else {
          info(`${key} is not stored in the config file`, globalOpts);
        }
      } catch (err) {
        error(`Failed to update config: ${errorMessage(err)}`, globalOpts);
        process.exit(1);
      }
    });
}

function configGetCommand(): Command {
  return new Command('get')
    .description('Show the effective value of a key')
    .argument('<key>', 'Configuration key')
    .action((rawKey: string, _options: unknown, command: Command) => {
      const globalOpts = getGlobalOptions(command);
      const key = requireKey(rawKey, globalOpts);
      const entry = resolveConfig(globalOpts.config).find((resolved) => resolved.key === key);

      if (globalOpts.json) {
        output({ [key]: entry?.value, source: entry?.source }, globalOpts);
      } else {
        output(displayValue(key, entry?.value), globalOpts);
      }
    });
}

function configListCommand(): Command {
  return new Command('list')
    .alias('ls')
    .description('List configuration values and where they come from')
    .action((_options: unknown, command: Command) => {
      const globalOpts = getGlobalOptions(command);
      const entries = resolveConfig(globalOpts.config).map((entry) => ({
        ...entry,
        value: entry.key === 'apiToken' && entry.value !== undefined ? '********' : entry.value,
      }));

      if (globalOpts.json) {
        output(entries, globalOpts);
        return;
      }

      const rows = entries.map((entry) => [
        entry.key,
        displayValue(entry.key, entry.value),
        entry.source === 'env' && entry.envVar ? `env (${entry.envVar})` : entry.source,
      ]);
      output(createTable(['Key', 'Value', 'Source'], rows).toString(), globalOpts);
    });
}

function configPathCommand(): Command {
  return new Command('path')
    .description('Show the configuration file path')
    .action((_options: unknown, command: Command) => {
      const globalOpts = getGlobalOptions(command);
      const path = globalOpts.config || getDefaultConfigPath();
      output(globalOpts.json ? { configPath: path } : path, globalOpts);
    });
}
