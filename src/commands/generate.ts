import * as clack from '@clack/prompts';
import type { IConfigManager, IProjectCreator } from '../interfaces.js';
import type { FeatureFlags } from '../core/project-config.js';
import { resolveProjectConfig } from '../core/project-config.js';
import { ConfigManager, getDefaultConfigDir } from '../core/config.js';
import { ProjectCreator } from '../templates/creator.js';
import { GitHandler } from '../templates/git-handler.js';
import { FileSystemManager } from '../utils/filesystem.js';
import { unwrapPrompt } from '../utils/clack-helpers.js';
import { validateProjectName } from '../cli/prompts/validators.js';
import { colors, symbols } from '../utils/colors.js';
import { ConfigError } from '../errors.js';
import { CLI_NAME } from '../constants.js';
import type { ProjectConfig } from '../types.js';
import process from "node:process";
const log = console.log;

export interface GenerateFlags extends FeatureFlags {
  author?: string;
  email?: string;
  description?: string;
  git?: boolean;
}

export interface GenerateDependencies {
  cwd?: string;
  configManager?: IConfigManager;
  creator?: IProjectCreator;
  /** Whether a missing name may be asked for (default: stdin is a TTY) */
  interactive?: boolean;
}

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

/**
 * Generate a FastAPI project. Resolves to the process exit code.
 */
export async function generateCommand(
  projectName: string | undefined,
  flags: GenerateFlags = {},
  deps: GenerateDependencies = {}
): Promise<number> {
  const configManager = deps.configManager ?? new ConfigManager(getDefaultConfigDir(), new FileSystemManager());
  const creator = deps.creator ?? new ProjectCreator(new FileSystemManager(), new GitHandler());
  const interactive = deps.interactive ?? Boolean(process.stdin.isTTY);

  clack.intro(colors.cyan(`${CLI_NAME} - Create a new FastAPI project`));

  let name = projectName;
  if (name === undefined && interactive) {
    const answer = unwrapPrompt(await clack.text({
      message: 'What is the name of your project?',
      placeholder: 'My API',
      validate: validateProjectName
    }), 'Project creation cancelled.');

    if (answer === undefined) {
      return EXIT_FAILURE;
    }
    name = answer;
  }

  const defaults = configManager.load();

  let config: ProjectConfig;
  try {
    config = resolveProjectConfig(
      {
        name: name ?? '',
        author: flags.author,
        email: flags.email,
        description: flags.description,
        postgres: flags.postgres,
        redis: flags.redis,
        docker: flags.docker,
        celery: flags.celery
      },
      { cwd: deps.cwd, defaults }
    );
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(colors.red(`${symbols.error} ${error.message}`));
      return EXIT_FAILURE;
    }
    throw error;
  }

  const git = flags.git ?? defaults.git ?? true;

  const spinner = clack.spinner();
  spinner.start(`Creating ${config.slug}...`);

  try {
    const result = await creator.generate(config, {
      git,
      onProgress: (message) => spinner.message(message)
    });

    spinner.stop(colors.green(`${symbols.success} Created ${result.files.length} files in ${result.rootPath}`));

    for (const warning of result.warnings) {
      clack.log.warn(colors.yellow(warning.message));
    }

    printNextSteps(config);
    return EXIT_SUCCESS;
  } catch (error) {
    spinner.stop(colors.red('Failed'));
    console.error(colors.red(`${symbols.error} Failed to create project: ${error instanceof Error ? error.message : String(error)}`));
    return EXIT_FAILURE;
  }
}

function printNextSteps(config: ProjectConfig): void {
  const { features } = config;

  log();
  log(colors.cyan('Next steps:'));
  log(colors.gray(`  cd ${config.slug}`));
  log(colors.gray('  python -m venv venv && source venv/bin/activate'));
  log(colors.gray('  make dev-install'));
  if (features.database) {
    log(colors.gray('  alembic upgrade head'));
  }
  log(colors.gray('  make run'));
  if (features.containerize) {
    log(colors.gray('  # or: docker compose up --build'));
  }
  log();
  clack.outro(colors.yellow('Happy coding!'));
}
