/**
 * Embedded README.md
 *
 * Every optional feature contributes its own bullet, tree entries and
 * instructions; nothing here mentions a feature that is switched off.
 */

import type { ProjectConfig } from '../../types.js';
import { API_PORT, API_V1_PREFIX, PYTHON_VERSION } from '../../constants.js';
import {
  blocks,
  lines,
  finalize,
  when,
  whenBackgroundTasks,
  whenCache,
  whenContainerized,
  whenDatabase
} from '../fragments.js';

const fence = (language: string, ...body: string[]) => lines('```' + language, ...body, '```');

function featureList(config: ProjectConfig): string {
  return lines(
    '## Features',
    '',
    '- FastAPI framework with async support',
    '- Pydantic v2 for data validation',
    when(whenDatabase(config), '- SQLAlchemy 2.0 ORM with PostgreSQL'),
    when(whenDatabase(config), '- Alembic for database migrations'),
    when(whenCache(config), '- Redis caching and rate limiting with SlowAPI'),
    when(whenBackgroundTasks(config), '- Celery background tasks with a Flower dashboard'),
    '- JWT authentication',
    when(whenContainerized(config), '- Docker and Docker Compose support'),
    '- Testing setup with pytest',
    '- Pre-commit hooks for code quality',
    '- GitHub Actions CI',
    '- Structured logging with Loguru',
    '- API documentation with Swagger UI and ReDoc'
  );
}

function requirementsList(config: ProjectConfig): string {
  return lines(
    '## Requirements',
    '',
    `- Python ${PYTHON_VERSION}+`,
    when(whenDatabase(config), '- PostgreSQL'),
    when(whenCache(config), '- Redis'),
    when(whenBackgroundTasks(config) && !whenCache(config), '- RabbitMQ (task broker)'),
    when(whenContainerized(config), '- Docker & Docker Compose (optional)')
  );
}

function projectTree(config: ProjectConfig): string {
  const withDatabase = whenDatabase(config);
  const withTasks = whenBackgroundTasks(config);
  const withContainers = whenContainerized(config);

  return lines(
    '## Project Structure',
    '',
    fence('',
      `${config.slug}/`,
      ...[
        '├── app/',
        '│   ├── api/',
        '│   │   ├── v1/',
        '│   │   │   ├── endpoints/',
        '│   │   │   └── api.py',
        '│   │   └── deps.py',
        '│   ├── core/',
        '│   │   ├── config.py',
        '│   │   ├── security.py',
        '│   │   └── logger.py',
        when(withDatabase, '│   ├── db/'),
        when(withDatabase, '│   │   ├── models/'),
        when(withDatabase, '│   │   ├── base.py'),
        when(withDatabase, '│   │   └── session.py'),
        '│   ├── schemas/',
        '│   ├── services/',
        when(withTasks, '│   ├── tasks/'),
        '│   ├── utils/',
        '│   ├── middleware/',
        when(withTasks, '│   ├── worker.py'),
        '│   └── main.py',
        '├── tests/',
        '│   ├── api/',
        '│   └── services/',
        when(withDatabase, '├── alembic/'),
        when(withDatabase, '│   └── versions/'),
        '├── scripts/',
        '├── docs/',
        '├── .github/',
        '│   └── workflows/',
        '├── requirements.txt',
        '├── requirements-dev.txt',
        when(withContainers, '├── Dockerfile'),
        when(withContainers, '├── docker-compose.yml'),
        '├── .env.example',
        '├── .gitignore',
        '├── Makefile',
        '├── pytest.ini',
        '└── README.md'
      ].filter((entry): entry is string => typeof entry === 'string')
    )
  );
}

function gettingStarted(config: ProjectConfig): string {
  let step = 0;
  const heading = (title: string) => `### ${++step}. ${title}`;

  return blocks(
    '## Getting Started',
    lines(
      heading('Setup'),
      '',
      fence('bash',
        `cd ${config.slug}`,
        '# .env was generated with a fresh SECRET_KEY; review it before deploying',
        'cp .env.example .env.local'
      )
    ),
    lines(
      heading('Install Dependencies'),
      '',
      fence('bash',
        'python -m venv venv',
        'source venv/bin/activate  # On Windows: venv\\Scripts\\activate',
        'make dev-install'
      )
    ),
    when(whenDatabase(config), () => lines(
      heading('Database Setup'),
      '',
      fence('bash', 'alembic upgrade head')
    )),
    lines(
      heading('Run Development Server'),
      '',
      fence('bash', 'make run'),
      '',
      'The API will be available at:',
      `- API: http://localhost:${API_PORT}`,
      `- Swagger UI: http://localhost:${API_PORT}${API_V1_PREFIX}/docs`,
      `- ReDoc: http://localhost:${API_PORT}${API_V1_PREFIX}/redoc`
    ),
    when(whenBackgroundTasks(config), () => lines(
      heading('Start the Worker'),
      '',
      fence('bash', 'make worker', '# optional dashboard on http://localhost:5555', 'make flower')
    )),
    when(whenContainerized(config), () => lines(
      heading('Using Docker'),
      '',
      fence('bash',
        'docker compose up --build',
        'docker compose logs -f',
        'docker compose down'
      )
    ))
  );
}

function development(config: ProjectConfig): string {
  return blocks(
    '## Development',
    lines(
      '### Running Tests',
      '',
      fence('bash', 'make test', 'make test-cov', 'pytest tests/test_health.py -v')
    ),
    lines(
      '### Code Quality',
      '',
      fence('bash', 'make format', 'make lint', 'pre-commit run --all-files')
    ),
    when(whenDatabase(config), () => lines(
      '### Database Migrations',
      '',
      fence('bash',
        'alembic revision --autogenerate -m "description"',
        'alembic upgrade head',
        'alembic downgrade -1',
        'alembic history'
      )
    ))
  );
}

function environmentVariables(config: ProjectConfig): string {
  return lines(
    '## Environment Variables',
    '',
    'See `.env.example` for all available variables. Key ones:',
    '',
    '- `SECRET_KEY`: signing key for JWT tokens (regenerate with `openssl rand -hex 32`)',
    when(whenDatabase(config), '- `DATABASE_URL`: PostgreSQL connection string'),
    when(whenCache(config), '- `REDIS_URL`: Redis connection string'),
    when(whenBackgroundTasks(config), '- `CELERY_BROKER_URL`: task broker connection string'),
    '- `ENVIRONMENT`: development/staging/production'
  );
}

function deployment(config: ProjectConfig): string {
  return blocks(
    '## Deployment',
    when(whenContainerized(config), () => lines(
      '### Container Image',
      '',
      fence('bash',
        `docker build -t ${config.slug}:latest .`,
        `docker run -p ${API_PORT}:${API_PORT} --env-file .env ${config.slug}:latest`
      )
    )),
    lines(
      '### Manual Deployment',
      '',
      fence('bash',
        'pip install -r requirements.txt',
        `gunicorn app.main:app -w 4 -k uvicorn.workers.UvicornWorker -b 0.0.0.0:${API_PORT}`
      )
    )
  );
}

export function renderReadme(config: ProjectConfig): string {
  return finalize(blocks(
    `# ${config.name}`,
    config.description,
    featureList(config),
    requirementsList(config),
    projectTree(config),
    gettingStarted(config),
    development(config),
    environmentVariables(config),
    deployment(config),
    lines('## License', '', 'MIT License'),
    lines('## Author', '', `${config.author} (${config.email})`)
  ));
}
