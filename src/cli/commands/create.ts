import { resolve } from 'path';
import chalk from 'chalk';
import type { EnclaveContext } from '../../context.js';
import type { GlobalCliOptions } from '../common/options.js';
import { describeNetwork } from '../common/session.js';

export interface CreateCliOptions extends GlobalCliOptions {
  id?: string;
  workspace?: string;
  image?: string;
  rebuild?: boolean;
  dryRun?: boolean;
}

export async function createCommand(options: CreateCliOptions, ctx: EnclaveContext): Promise<void> {
  const { session, plan } = await ctx.manager.create(
    {
      id: options.id,
      backend: options.backend ?? ctx.config.backend,
      workspace: resolve(options.workspace ?? ctx.env.cwd()),
      image: options.image ?? ctx.config.image,
      allowedDomains: options.allowDomain,
    },
    { dryRun: options.dryRun, rebuild: options.rebuild },
  );

  if (options.dryRun) {
    console.log(chalk.cyan(`\n🔍 Dry run for session ${session.id} (${session.backend})\n`));
    console.log(chalk.gray(`   Workspace: ${session.workspace}`));
    console.log(chalk.gray(`   Image: ${session.image}`));
    console.log(chalk.gray(`   Network: ${describeNetwork(session)}`));
    console.log(chalk.gray(`   Isolation: ${plan.mechanism}`));
    if (plan.relay) {
      console.log(chalk.gray(`   Relay: ${plan.relay.name} (${plan.relay.shared ? 'shared' : 'per session'}, port ${plan.relay.port})`));
    }
    for (const resource of plan.resources) {
      console.log(chalk.gray(`   - ${resource.kind} ${resource.name}`));
    }
    console.log(chalk.gray('\nNothing was created.'));
    return;
  }

  console.log(chalk.green(`✅ Session ${session.id} created (${session.backend})`));
  console.log(chalk.gray(`   Workspace: ${session.workspace}`));
  console.log(chalk.gray(`   Network: ${describeNetwork(session)}`));
  console.log(chalk.gray(`   Next: enclave start ${session.id}`));
}
