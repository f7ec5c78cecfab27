#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import * as packageJson from '../package.json';
import { loadSettings } from './config';
import { buildPlan } from './planning';
import { Ec2NetworkClient } from './provisioning';
import { execute, resourcesLeftInPlace } from './orchestration';
import { ExecutionResult, InvalidInputError, PlannedStep, ProvisioningPlan, StepResult } from './types';

interface CreateOptions {
  vpcCidr: string;
  vpcName: string;
  publicSubnetCidr: string;
  privateSubnetCidr: string;
  availabilityZone: string;
  config?: string;
  verbose?: boolean;
  dryRun?: boolean;
}

const program = new Command();

program
  .name('vpc-provision')
  .description('Create a VPC with a public and a private subnet and their routing')
  .version(packageJson.version);

program
  .command('create')
  .description('Provision the VPC, internet gateway, subnets and route tables')
  .requiredOption('--vpc-cidr <cidr>', 'VPC CIDR block')
  .requiredOption('--vpc-name <name>', 'VPC name tag')
  .requiredOption('--public-subnet-cidr <cidr>', 'Public subnet CIDR')
  .requiredOption('--private-subnet-cidr <cidr>', 'Private subnet CIDR')
  .requiredOption('--availability-zone <zone>', 'Availability zone, e.g. us-east-1a')
  .option('-c, --config <path>', 'Path to a settings file (default: network.yml if present)')
  .option('-v, --verbose', 'Enable verbose logging')
  .option('--dry-run', 'Show the provisioning plan without calling AWS')
  .action(async (options: CreateOptions) => {
    const spinner = ora('Validating network parameters...').start();
    const controller = new AbortController();
    const onInterrupt = () => {
      controller.abort();
      spinner.warn('Interrupt received - stopping before the next step');
    };

    try {
      const settings = await loadSettings(options.config);
      const plan = buildPlan(
        {
          vpcCidr: options.vpcCidr,
          vpcName: options.vpcName,
          publicCidr: options.publicSubnetCidr,
          privateCidr: options.privateSubnetCidr,
          availabilityZone: options.availabilityZone,
          tags: settings.provisioning.tags
        },
        { enforceSubnetContainment: settings.provisioning.enforce_subnet_containment }
      );

      if (options.dryRun) {
        spinner.succeed('Dry run completed - plan is valid');
        printPlan(plan, settings.aws.region);
        return;
      }

      process.once('SIGINT', onInterrupt);

      const client = new Ec2NetworkClient({
        region: settings.aws.region,
        waitTimeoutSeconds: settings.provisioning.wait_timeout_seconds
      });

      const result = await execute(plan, client, {
        signal: controller.signal,
        onStepStart: step => {
          spinner.start(`${step.description}...`);
        },
        onStepComplete: (stepResult, step) => {
          if (stepResult.status === 'succeeded') {
            spinner.succeed(describeSuccess(stepResult, step));
          } else {
            spinner.fail(`${step.description} failed`);
          }
        }
      });

      if (result.success) {
        console.log(chalk.green('\n🎉 All resources created successfully!'));
        if (options.verbose) {
          console.log(chalk.gray(`⏱️  Provisioning took ${result.metadata.duration}ms`));
          console.log(chalk.gray(`🆔 Execution ID: ${result.metadata.executionId}`));
        }
        return;
      }

      reportFailure(result, options.verbose ?? false);
      process.exitCode = 1;
    } catch (error) {
      if (spinner.isSpinning) {
        spinner.fail(error instanceof InvalidInputError ? 'Invalid network parameters' : 'Provisioning failed');
      }
      console.error(chalk.red('❌ Error:'), error instanceof Error ? error.message : error);
      if (options.verbose && !(error instanceof InvalidInputError)) {
        console.error(error);
      }
      process.exitCode = 1;
    } finally {
      process.removeListener('SIGINT', onInterrupt);
    }
  });

function describeSuccess(result: StepResult, step: PlannedStep): string {
  const id = result.handle?.id ?? 'unknown';

  switch (step.action) {
    case 'create-vpc':
      return `Created VPC: ${id}`;
    case 'create-internet-gateway':
      return `Created and attached Internet Gateway: ${id}`;
    case 'create-subnet':
      return `Created Subnet: ${id} (${step.nameTag})`;
    case 'create-route-table':
      return result.routes && result.routes.length > 0
        ? `Public Route added to IGW in ${step.nameTag} (${id})`
        : `Created private Route Table: ${id}`;
  }
}

function reportFailure(result: ExecutionResult, verbose: boolean): void {
  if (result.status === 'cancelled') {
    console.error(chalk.red('❌ Error:'), `Provisioning cancelled before ${result.remainingSteps[0]}`);
  } else if (result.failure) {
    console.error(chalk.red('❌ Error:'), result.failure.error.message);
  }

  const leftInPlace = resourcesLeftInPlace(result);
  if (leftInPlace.length > 0) {
    console.error(chalk.yellow('\n⚠️  Resources left in place (not rolled back):'));
    leftInPlace.forEach(handle => console.error(`  ${handle.kind}: ${handle.id}`));
  }

  if (verbose && result.failure?.error.cause) {
    console.error(result.failure.error.cause);
  }
}

function printPlan(plan: ProvisioningPlan, region: string): void {
  console.log(chalk.blue(`\n📋 Provisioning plan (${region}):`));
  plan.steps.forEach((step, index) => {
    console.log(`  ${index + 1}. ${step.description}`);
    console.log(chalk.gray(`     Name=${step.nameTag}${step.requires.length > 0 ? `, uses ${step.requires.join(', ')}` : ''}`));
  });
}

// Error handling for unknown commands
program.on('command:*', () => {
  console.error(chalk.red('❌ Invalid command. See --help for available commands.'));
  process.exit(1);
});

// Show help if no command provided
if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  program.parseAsync().catch((error: unknown) => {
    console.error(chalk.red('❌ Error:'), error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
}
