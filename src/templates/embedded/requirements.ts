/**
 * Embedded dependency lists (requirements.txt, requirements-dev.txt)
 *
 * Section order is fixed: core, security, database, caching, background
 * tasks, then logging, email, utilities and production. Tooling keys off
 * the section boundaries, so keep new packages inside their section.
 */

import type { ProjectConfig } from '../../types.js';
import { blocks, finalize, section, when, whenBackgroundTasks, whenCache, whenDatabase } from '../fragments.js';

export function renderRequirements(config: ProjectConfig): string {
  return finalize(blocks(
    section('Core',
      'fastapi==0.115.0',
      'uvicorn[standard]==0.32.0',
      'pydantic==2.11.4',
      'pydantic-settings==2.9.1',
      'python-multipart==0.0.20',
      'python-dotenv==1.1.0'
    ),
    section('Security',
      'python-jose[cryptography]==3.3.0',
      'passlib[bcrypt]==1.7.4',
      'bcrypt==4.0.1'
    ),
    when(whenDatabase(config), () => section('Database',
      'sqlalchemy==2.0.41',
      'alembic==1.15.2',
      'psycopg2-binary==2.9.10'
    )),
    when(whenCache(config), () => section('Caching and Rate Limiting',
      'redis==5.0.0',
      'slowapi==0.1.9'
    )),
    when(whenBackgroundTasks(config), () => section('Background Tasks',
      'celery==5.3.4',
      'flower==2.0.1'
    )),
    section('Logging',
      'loguru==0.7.3'
    ),
    section('Email',
      'emails==0.6',
      'jinja2==3.1.6',
      'email-validator==2.2.0'
    ),
    section('Utilities',
      'httpx==0.27.0',
      'python-dateutil==2.8.2'
    ),
    section('Production',
      'gunicorn==23.0.0'
    )
  ));
}

const DEV_REQUIREMENTS = `# Testing
pytest==8.3.0
pytest-asyncio==0.24.0
pytest-cov==6.0.0
pytest-mock==3.14.0
httpx==0.27.0

# Code Quality
black==24.10.0
flake8==7.1.0
mypy==1.13.0
isort==5.13.0
pylint==3.3.0

# Pre-commit
pre-commit==4.0.0

# Development
ipython==8.29.0
`;

export function renderDevRequirements(): string {
  return DEV_REQUIREMENTS;
}
