// src/cli/commands/install-browsers.ts
import { Command } from 'commander';
import { execSync } from 'child_process';

export function registerInstallBrowsersCommand(program: Command): void {
  program
    .command('install-browsers')
    .description('Install the bundled Chromium used by --browser chromium')
    .action(() => {
      try {
        execSync('npx playwright install chromium', {
          stdio: 'inherit',
        });
        console.log('✓ Chromium installed');
      } catch {
        console.error('✗ Failed to install Chromium');
        console.error('Note: a system Chrome or Edge is used when available.');
        process.exit(1);
      }
    });
}
