import { Command } from 'commander';
import { generateCommand } from './commands/generate.js';
import type { GenerateFlags } from './commands/generate.js';
import { colors } from './utils/colors.js';
import { CLI_NAME, CLI_VERSION } from './constants.js';
import process from "node:process";

export type GenerateAction = (projectName: string | undefined, flags: GenerateFlags) => Promise<number>;

type CommandOptions = {
  author?: string;
  email?: string;
  description?: string;
  postgres: boolean;
  redis: boolean;
  docker: boolean;
  celery?: boolean;
  git: boolean;
};

/**
 * Read the parsed options. `--no-*` switches default to true in commander;
 * a value that was never typed is reported as undefined so defaults.toml
 * still gets a say.
 */
export function readFlags(command: Command): GenerateFlags {
  const options = command.opts<CommandOptions>();
  const explicit = (key: keyof CommandOptions) => command.getOptionValueSource(key) !== 'default';

  return {
    author: options.author,
    email: options.email,
    description: options.description,
    postgres: explicit('postgres') ? options.postgres : undefined,
    redis: explicit('redis') ? options.redis : undefined,
    docker: explicit('docker') ? options.docker : undefined,
    celery: options.celery,
    git: explicit('git') ? options.git : undefined
  };
}

export function setupCLI(action: GenerateAction = generateCommand): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Generate a production-ready FastAPI project')
    .version(CLI_VERSION)
    .argument('[project-name]', 'Name of the project to create')
    .option('--author <name>', 'Author name')
    .option('--email <email>', 'Author email')
    .option('--description <text>', 'Project description')
    .option('--no-postgres', 'Skip PostgreSQL, SQLAlchemy and Alembic')
    .option('--no-redis', 'Skip Redis caching and rate limiting')
    .option('--no-docker', 'Skip Dockerfile and docker-compose.yml')
    .option('--celery', 'Add Celery background tasks')
    .option('--no-git', 'Do not create a git repository')
    .action(async (projectName: string | undefined, _options: CommandOptions, command: Command) => {
      try {
        process.exitCode = await action(projectName, readFlags(command));
      } catch (error) {
        console.error(colors.red('Fatal error:'), error);
        process.exitCode = 1;
      }
    });

  return program;
}
