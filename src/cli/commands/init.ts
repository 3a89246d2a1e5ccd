import { Command } from 'commander';
import { ConfigManager } from '../../core/config.js';

export function createInitCommand(): Command {
  return new Command('init')
    .description('Write a default global configuration file')
    .action(() => {
      const path = new ConfigManager().createDefaultConfig();
      console.log(`Configuration: ${path}`);
    });
}
