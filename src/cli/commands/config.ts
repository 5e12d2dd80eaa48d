import chalk from 'chalk';
import type { ConfigManager } from '../../config/index.js';

export async function configCommand(options: { show?: boolean; set?: string[] }, manager: ConfigManager): Promise<void> {
  for (const assignment of options.set ?? []) {
    manager.setFromString(assignment);
    console.log(chalk.green(`✅ Saved ${assignment.split('=')[0]}`));
  }

  if (options.show || !options.set || options.set.length === 0) {
    const config = manager.config;
    console.log(chalk.cyan('\n📋 Current configuration:\n'));
    console.log(chalk.gray(`   Config file: ${manager.getConfigPath()}`));
    console.log(chalk.gray(`   Backend: ${config.backend}`));
    console.log(chalk.gray(`   Image: ${config.image}`));
    console.log(chalk.gray(`   Relay image: ${config.relayImage}`));
    console.log(chalk.gray(`   Container engine: ${config.containerEngine}`));
    console.log(chalk.gray(`   Kube context: ${config.kubeContext || '(current)'}`));
    console.log(chalk.gray(`   Namespace: ${config.namespace || '(default)'}`));
    console.log(chalk.gray(`   Registry: ${config.registry || '(not set)'}`));
    console.log(chalk.gray(`   Storage class: ${config.storageClass || '(cluster default)'}`));
    console.log(chalk.gray(`   Volume size: ${config.volumeSize}`));
    console.log(chalk.gray(`   Allowed domains: ${config.allowedDomains.join(', ')}`));
    console.log(chalk.gray(`   Credential timeout: ${config.credentialTimeoutMinutes} min`));
    console.log(chalk.gray(`   Activity check interval: ${config.credentialCheckIntervalSeconds} s`));
    console.log(chalk.gray(`   Watchdog: ${config.watchdogEnabled ? 'on' : 'off'}`));
    console.log('');
  }
}
