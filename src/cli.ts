#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { readFileSync } from 'fs';
import { writeFile } from 'fs/promises';
import { v4 as uuidv4 } from 'uuid';
import { isLogLevel, loadSettings } from './config/settings.js';
import { isPlainObject } from './config/merge.js';
import { ConfigError, TaskDefError, errorMessage } from './errors.js';
import { GenerationOrchestrator } from './orchestration/generation-orchestrator.js';
import { autoscalerOutputs, emitOutputs, failedAutoscalerOutputs } from './orchestration/outputs.js';
import { renderTaskDefinition } from './templates/template-engine.js';
import { bindLogContext, getLogger, setLogLevel } from './utils/logging.js';

interface GenerateCommandOptions {
  output: string;
  logLevel?: string;
  validateOnly?: boolean;
  stdout?: boolean;
}

interface PublishCommandOptions {
  commitSha?: string;
  logLevel?: string;
}

function packageVersion(): string {
  const parsed: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  return isPlainObject(parsed) && typeof parsed.version === 'string' ? parsed.version : '0.0.0';
}

function startRun(logLevel?: string): string {
  const runId = uuidv4();
  if (logLevel !== undefined) {
    const level = logLevel.toLowerCase();
    if (!isLogLevel(level)) {
      throw new ConfigError(`Invalid log level: ${logLevel}`);
    }
    setLogLevel(level);
  }
  bindLogContext({ runId });
  return runId;
}

function reportError(error: unknown): void {
  if (error instanceof ConfigError && error.details.length > 0) {
    console.error(chalk.red('❌ Configuration errors:'));
    error.details.forEach(detail => console.error(chalk.red(`  - ${detail}`)));
  } else if (error instanceof TaskDefError) {
    console.error(chalk.red(`❌ ${error.code}:`), error.message);
  } else {
    console.error(chalk.red('❌ Unexpected error:'), errorMessage(error));
    getLogger().error({ err: error }, 'Unexpected error');
  }
}

const program = new Command();

program
  .name('ecs-taskdef')
  .description('Generate ECS task definitions from a simplified service description')
  .version(packageVersion());

program
  .command('generate')
  .description('Generate the task definition for one service or task')
  .argument('<config>', 'Path to the service description (YAML or JSON)')
  .argument('<cluster>', 'ECS cluster name')
  .argument('<region>', 'AWS region')
  .argument('<registry>', 'Registry for private sidecar images')
  .argument('<containerRegistry>', 'Registry for the application image (may be empty)')
  .argument('<image>', 'Application image name')
  .argument('<tag>', 'Application image tag')
  .argument('<service>', 'Service or task name')
  .option('-o, --output <path>', 'Output file for the task definition', 'task-definition.json')
  .option('--log-level <level>', 'Log level (fatal, error, warn, info, debug, trace)')
  .option('--validate-only', 'Validate the configuration without contacting AWS or writing output')
  .option('--stdout', 'Also print the task definition to stdout')
  .action(
    async (
      config: string,
      cluster: string,
      region: string,
      registry: string,
      containerRegistry: string,
      image: string,
      tag: string,
      service: string,
      options: GenerateCommandOptions
    ) => {
      const spinner = ora('Loading service configuration...').start();

      try {
        const runId = startRun(options.logLevel);
        const orchestrator = new GenerationOrchestrator();

        if (options.validateOnly) {
          const report = await orchestrator.validate(config, service);
          spinner.succeed(`Configuration for ${chalk.cyan(report.appName)} is valid`);
          if (report.autoscaling && !report.autoscaling.valid) {
            console.error(chalk.yellow('⚠️  autoscaling_configs is invalid and will not be published:'));
            report.autoscaling.errors.forEach(message => console.error(chalk.yellow(`  - ${message}`)));
          }
          return;
        }

        spinner.text = 'Generating task definition...';
        const result = await orchestrator.generate({
          configPath: config,
          service,
          target: { cluster, region, registry, containerRegistry, imageName: image, tag }
        });

        const json = renderTaskDefinition(result.taskDefinition);
        await writeFile(options.output, `${json}\n`, 'utf-8');
        spinner.succeed(`Task definition written to ${options.output}`);

        if (options.stdout) {
          process.stdout.write(`${json}\n`);
        }

        console.error(chalk.green('\n✅ Generation Results:'));
        console.error(`📦 Family: ${result.family}`);
        console.error(`🔁 Replica count: ${result.replicaCount ?? 'not set'}`);
        console.error(chalk.gray(`🆔 Run ID: ${runId}`));
      } catch (error) {
        spinner.fail('Task definition generation failed');
        reportError(error);
        process.exit(1);
      }
    }
  );

program
  .command('publish-autoscaling')
  .description('Publish autoscaling_configs to DynamoDB (never fails the deploy)')
  .argument('<config>', 'Path to the service description')
  .argument('<environment>', 'Deployment environment')
  .argument('<cluster>', 'ECS cluster name')
  .argument('<service>', 'ECS service name')
  .argument('<region>', 'AWS region')
  .option('--commit-sha <sha>', 'Source revision (defaults to GITHUB_SHA)')
  .option('--log-level <level>', 'Log level (fatal, error, warn, info, debug, trace)')
  .action(
    async (
      config: string,
      environment: string,
      cluster: string,
      service: string,
      region: string,
      options: PublishCommandOptions
    ) => {
      const spinner = ora('Publishing autoscaling configuration...').start();

      try {
        startRun(options.logLevel);
        const outcome = await new GenerationOrchestrator().publishAutoscaling({
          configPath: config,
          environment,
          cluster,
          service,
          region,
          ...(options.commitSha ? { commitSha: options.commitSha } : {})
        });

        switch (outcome.state) {
          case 'PUBLISHED':
            spinner.succeed(`Published autoscaling config for ${outcome.serviceKey}`);
            break;
          case 'ABSENT':
            spinner.info('No autoscaling_configs block, nothing to publish');
            break;
          case 'SKIPPED':
            spinner.warn(`Skipped publish (${outcome.reason ?? 'unknown reason'})`);
            break;
          default:
            spinner.warn(`Autoscaling config not published (${outcome.state}); deploy continues`);
            (outcome.errors ?? []).forEach(message => console.error(chalk.yellow(`  - ${message}`)));
        }

        await emitOutputs(autoscalerOutputs(outcome), loadSettings().githubOutput);
      } catch (error) {
        spinner.warn('Autoscaling publish did not complete; deploy continues');
        console.error(chalk.yellow('⚠️ '), errorMessage(error));
        // Settings may be what failed, so the output file comes straight from the environment
        await emitOutputs(failedAutoscalerOutputs(), process.env.GITHUB_OUTPUT).catch((writeError: unknown) => {
          console.error(chalk.yellow('⚠️ '), errorMessage(writeError));
        });
      }
    }
  );

program
  .command('validate')
  .description('Validate a service description without contacting AWS')
  .argument('<config>', 'Path to the service description')
  .argument('[service]', 'Service or task name')
  .action(async (config: string, service: string | undefined) => {
    const spinner = ora('Validating configuration...').start();

    try {
      startRun();
      const report = await new GenerationOrchestrator().validate(config, service);
      spinner.succeed(`Configuration for ${chalk.cyan(report.appName)} is valid`);
      console.error(`🔐 Secret references: ${report.secretReferenceCount}`);
      if (report.autoscaling) {
        if (report.autoscaling.valid) {
          console.error(chalk.green('📈 autoscaling_configs is valid'));
        } else {
          console.error(chalk.yellow('⚠️  autoscaling_configs is invalid:'));
          report.autoscaling.errors.forEach(message => console.error(chalk.yellow(`  - ${message}`)));
        }
      }
    } catch (error) {
      spinner.fail('Validation failed');
      reportError(error);
      process.exit(1);
    }
  });

await program.parseAsync();
