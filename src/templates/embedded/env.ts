/**
 * Environment file (.env and .env.example)
 *
 * Both files are rendered by `renderEnvFile`, so they always carry the same
 * keys and the same generated SECRET_KEY.
 */

import type { ProjectConfig } from '../../types.js';
import { API_PORT, API_V1_PREFIX } from '../../constants.js';
import {
  CORS_ORIGINS,
  blocks,
  brokerSettings,
  databaseUrl,
  finalize,
  redisUrl,
  section,
  whenBackgroundTasks,
  whenCache,
  whenDatabase
} from '../fragments.js';

export interface EnvSection {
  title: string;
  entries: ReadonlyArray<readonly [key: string, value: string]>;
}

/**
 * The environment as ordered sections of KEY/VALUE pairs.
 */
export function buildEnvironment(config: ProjectConfig): EnvSection[] {
  const sections: EnvSection[] = [
    {
      title: 'Application',
      entries: [
        ['PROJECT_NAME', config.name],
        ['VERSION', '1.0.0'],
        ['API_V1_STR', API_V1_PREFIX],
        ['ENVIRONMENT', 'development']
      ]
    },
    {
      title: 'Server',
      entries: [
        ['SERVER_HOST', 'http://localhost'],
        ['SERVER_PORT', String(API_PORT)]
      ]
    },
    {
      title: 'Security (Generated automatically - change in production)',
      entries: [
        ['SECRET_KEY', config.secret],
        ['ACCESS_TOKEN_EXPIRE_MINUTES', String(60 * 24 * 7)],
        ['ALGORITHM', 'HS256']
      ]
    },
    {
      title: 'CORS',
      entries: [['BACKEND_CORS_ORIGINS', JSON.stringify(CORS_ORIGINS)]]
    }
  ];

  if (whenDatabase(config)) {
    sections.push({
      title: 'Database',
      entries: [
        ['DATABASE_URL', databaseUrl(config, 'localhost')],
        ['DATABASE_POOL_SIZE', '5'],
        ['DATABASE_MAX_OVERFLOW', '10']
      ]
    });
  }

  if (whenCache(config)) {
    sections.push({
      title: 'Redis',
      entries: [['REDIS_URL', redisUrl('localhost')]]
    });
  }

  if (whenBackgroundTasks(config)) {
    const broker = brokerSettings(config, 'localhost');
    sections.push({
      title: 'Background Tasks',
      entries: [
        ['CELERY_BROKER_URL', broker.brokerUrl],
        ['CELERY_RESULT_BACKEND', broker.resultBackend]
      ]
    });
  }

  sections.push(
    {
      title: 'Email (Optional)',
      entries: [
        ['SMTP_TLS', 'true'],
        ['SMTP_PORT', '587'],
        ['SMTP_HOST', 'smtp.example.com'],
        ['SMTP_USER', 'your-email@example.com'],
        ['SMTP_PASSWORD', 'your-password'],
        ['EMAILS_FROM_EMAIL', 'noreply@example.com'],
        ['EMAILS_FROM_NAME', config.name]
      ]
    },
    {
      title: 'Admin',
      entries: [
        ['FIRST_SUPERUSER_EMAIL', 'admin@example.com'],
        ['FIRST_SUPERUSER_PASSWORD', 'changethis']
      ]
    }
  );

  return sections;
}

export function renderEnvFile(config: ProjectConfig): string {
  return finalize(blocks(
    ...buildEnvironment(config).map(({ title, entries }) =>
      section(title, ...entries.map(([key, value]) => `${key}=${value}`))
    )
  ));
}
