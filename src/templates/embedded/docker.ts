/**
 * Embedded container files: Dockerfile, docker-compose.yml and .dockerignore
 *
 * The compose file derives every `depends_on` list from the same service
 * table it renders, so a service is referenced only when it is defined.
 */

import type { ProjectConfig } from '../../types.js';
import { API_PORT, PYTHON_VERSION } from '../../constants.js';
import {
  DATABASE_PASSWORD,
  DATABASE_USER,
  blocks,
  brokerSettings,
  containerName,
  databaseName,
  databaseUrl,
  finalize,
  lines,
  redisUrl,
  when,
  whenBackgroundTasks,
  whenCache,
  whenDatabase
} from '../fragments.js';

export function renderDockerfile(config: ProjectConfig): string {
  const systemPackages = [
    'netcat-traditional',
    ...(whenDatabase(config) ? ['libpq-dev'] : []),
    'gcc'
  ];

  return finalize(lines(
    `FROM python:${PYTHON_VERSION}-slim`,
    '',
    'WORKDIR /app',
    '',
    '# Install system dependencies',
    'RUN apt-get update && apt-get install -y \\',
    ...systemPackages.map(pkg => `    ${pkg} \\`),
    '    && apt-get clean \\',
    '    && rm -rf /var/lib/apt/lists/*',
    '',
    'COPY requirements.txt .',
    '',
    'RUN pip install --no-cache-dir --upgrade pip && \\',
    '    pip install --no-cache-dir -r requirements.txt',
    '',
    'COPY ./app /app/app',
    '',
    '# Create non-root user',
    'RUN useradd -m -u 1000 appuser && chown -R appuser:appuser /app',
    'USER appuser',
    '',
    `EXPOSE ${API_PORT}`,
    '',
    `CMD ["uvicorn", "app.main:app", "--host", "0.0.0.0", "--port", "${API_PORT}"]`
  ));
}

interface ComposeService {
  name: string;
  body: string[];
}

/**
 * Infrastructure services the application containers depend on, in render order.
 */
export function infrastructureServices(config: ProjectConfig): ComposeService[] {
  const services: ComposeService[] = [];

  if (whenDatabase(config)) {
    services.push({
      name: 'db',
      body: [
        'image: postgres:15',
        `container_name: ${containerName(config, 'db')}`,
        'environment:',
        `  POSTGRES_USER: ${DATABASE_USER}`,
        `  POSTGRES_PASSWORD: ${DATABASE_PASSWORD}`,
        `  POSTGRES_DB: ${databaseName(config)}`,
        'volumes:',
        '  - postgres_data:/var/lib/postgresql/data',
        'ports:',
        '  - "5432:5432"',
        'restart: unless-stopped'
      ]
    });
  }

  if (whenCache(config)) {
    services.push({
      name: 'redis',
      body: [
        'image: redis:7-alpine',
        `container_name: ${containerName(config, 'redis')}`,
        'ports:',
        '  - "6379:6379"',
        'restart: unless-stopped'
      ]
    });
  }

  // Without a cache server the task queue needs its own broker
  if (whenBackgroundTasks(config) && !whenCache(config)) {
    services.push({
      name: 'rabbitmq',
      body: [
        'image: rabbitmq:3-management-alpine',
        `container_name: ${containerName(config, 'rabbitmq')}`,
        'ports:',
        '  - "5672:5672"',
        '  - "15672:15672"',
        'restart: unless-stopped'
      ]
    });
  }

  return services;
}

/**
 * Connection settings overridden so containers reach each other by service name.
 */
function containerEnvironment(config: ProjectConfig): string[] {
  const entries: string[] = [];
  if (whenDatabase(config)) {
    entries.push(`DATABASE_URL: ${databaseUrl(config, 'db')}`);
  }
  if (whenCache(config)) {
    entries.push(`REDIS_URL: ${redisUrl('redis')}`);
  }
  if (whenBackgroundTasks(config)) {
    const broker = brokerSettings(config, whenCache(config) ? 'redis' : 'rabbitmq');
    entries.push(`CELERY_BROKER_URL: ${broker.brokerUrl}`);
    entries.push(`CELERY_RESULT_BACKEND: ${broker.resultBackend}`);
  }
  return entries;
}

function keyedList(key: string, values: string[]): string[] {
  if (values.length === 0) {
    return [];
  }
  return [`${key}:`, ...values.map(value => `  - ${value}`)];
}

function keyedMap(key: string, entries: string[]): string[] {
  if (entries.length === 0) {
    return [];
  }
  return [`${key}:`, ...entries.map(entry => `  ${entry}`)];
}

function applicationServices(config: ProjectConfig, infrastructure: ComposeService[]): ComposeService[] {
  const dependencies = infrastructure.map(service => service.name);
  const environment = containerEnvironment(config);

  const services: ComposeService[] = [
    {
      name: 'api',
      body: [
        'build: .',
        `container_name: ${containerName(config, 'api')}`,
        'ports:',
        `  - "${API_PORT}:${API_PORT}"`,
        'volumes:',
        '  - ./app:/app/app',
        ...keyedList('env_file', ['.env']),
        ...keyedMap('environment', environment),
        ...keyedList('depends_on', dependencies),
        'restart: unless-stopped',
        'healthcheck:',
        `  test: ["CMD", "python", "-c", "import urllib.request; urllib.request.urlopen('http://localhost:${API_PORT}/health')"]`,
        '  interval: 30s',
        '  timeout: 10s',
        '  retries: 3'
      ]
    }
  ];

  if (whenBackgroundTasks(config)) {
    services.push(
      {
        name: 'worker',
        body: [
          'build: .',
          `container_name: ${containerName(config, 'worker')}`,
          'command: celery -A app.worker.celery_app worker --loglevel=info',
          ...keyedList('env_file', ['.env']),
          ...keyedMap('environment', environment),
          ...keyedList('depends_on', dependencies),
          'restart: unless-stopped'
        ]
      },
      {
        name: 'flower',
        body: [
          'build: .',
          `container_name: ${containerName(config, 'flower')}`,
          'command: celery -A app.worker.celery_app flower --port=5555',
          'ports:',
          '  - "5555:5555"',
          ...keyedList('env_file', ['.env']),
          ...keyedMap('environment', environment),
          ...keyedList('depends_on', ['worker']),
          'restart: unless-stopped'
        ]
      }
    );
  }

  return services;
}

function renderService(service: ComposeService): string {
  return lines(`  ${service.name}:`, ...service.body.map(line => `    ${line}`));
}

export function renderCompose(config: ProjectConfig): string {
  const infrastructure = infrastructureServices(config);
  const services = [...applicationServices(config, infrastructure), ...infrastructure];

  return finalize(blocks(
    lines('services:', blocks(...services.map(renderService))),
    when(whenDatabase(config), lines('volumes:', '  postgres_data:'))
  ));
}

export const DOCKERIGNORE = `__pycache__
*.pyc
*.pyo
*.pyd
.Python
env/
venv/
.venv
pip-log.txt
pip-delete-this-directory.txt
.tox/
.coverage
.coverage.*
.cache
nosetests.xml
coverage.xml
*.cover
*.log
.git
.mypy_cache
.pytest_cache
.hypothesis
.env
.env.local
*.db
*.sqlite
.DS_Store
`;
