import chalk from 'chalk';
import type { TmuxManager } from '../../tmux/manager.js';

/** Exit early with install hints when tmux is missing. */
export function ensureTmuxInstalled(tmux: TmuxManager, platform: NodeJS.Platform = process.platform): void {
  if (platform === 'win32') {
    console.error(chalk.red('tmux is required but not available on native Windows.'));
    console.log(chalk.gray('Use WSL, or run on macOS/Linux with tmux installed.'));
    process.exit(1);
  }

  if (tmux.isInstalled()) return;

  console.error(chalk.red('tmux is required but not installed (or not in PATH).'));
  console.log(chalk.gray('Install tmux and retry:'));
  if (platform === 'darwin') {
    console.log(chalk.gray('  brew install tmux'));
  } else {
    console.log(chalk.gray('  sudo apt-get install -y tmux   # Debian/Ubuntu'));
    console.log(chalk.gray('  sudo dnf install -y tmux       # Fedora/RHEL'));
  }
  process.exit(1);
}
