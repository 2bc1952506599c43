/**
 * Embedded app/core modules: settings, security helpers and logging setup
 */

import type { ProjectConfig } from '../../types.js';
import { API_PORT, API_V1_PREFIX } from '../../constants.js';
import { CORS_ORIGINS, blocks, finalize, indent, lines, when, whenBackgroundTasks, whenCache, whenDatabase } from '../fragments.js';

/**
 * Escape a value for a double-quoted Python string literal.
 */
export function pythonString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function renderSettingsModule(config: ProjectConfig): string {
  const fields = blocks(
    lines(
      '# Project Info',
      `PROJECT_NAME: str = ${pythonString(config.name)}`,
      'VERSION: str = "1.0.0"',
      `API_V1_STR: str = "${API_V1_PREFIX}"`,
      'ENVIRONMENT: str = "development"'
    ),
    lines(
      '# Server',
      'SERVER_HOST: str = "http://localhost"',
      `SERVER_PORT: int = ${API_PORT}`
    ),
    lines(
      '# Security',
      'SECRET_KEY: str',
      'ACCESS_TOKEN_EXPIRE_MINUTES: int = 60 * 24 * 7  # 7 days',
      'ALGORITHM: str = "HS256"'
    ),
    lines(
      '# CORS',
      'BACKEND_CORS_ORIGINS: List[str] = [',
      ...CORS_ORIGINS.map(origin => `    "${origin}",`),
      ']',
      '',
      '@field_validator("BACKEND_CORS_ORIGINS", mode="before")',
      '@classmethod',
      'def assemble_cors_origins(cls, v: str | List[str]) -> List[str] | str:',
      '    if isinstance(v, str) and not v.startswith("["):',
      '        return [i.strip() for i in v.split(",")]',
      '    elif isinstance(v, (list, str)):',
      '        return v',
      '    raise ValueError(v)'
    ),
    when(whenDatabase(config), () => lines(
      '# Database',
      'DATABASE_URL: str',
      'DATABASE_POOL_SIZE: int = 5',
      'DATABASE_MAX_OVERFLOW: int = 10'
    )),
    when(whenCache(config), () => lines(
      '# Redis',
      'REDIS_URL: str = "redis://localhost:6379/0"'
    )),
    when(whenBackgroundTasks(config), () => lines(
      '# Background Tasks',
      'CELERY_BROKER_URL: str',
      'CELERY_RESULT_BACKEND: str'
    )),
    lines(
      '# Email (optional)',
      'SMTP_TLS: bool = True',
      'SMTP_PORT: int = 587',
      'SMTP_HOST: Optional[str] = None',
      'SMTP_USER: Optional[str] = None',
      'SMTP_PASSWORD: Optional[str] = None',
      'EMAILS_FROM_EMAIL: Optional[EmailStr] = None',
      'EMAILS_FROM_NAME: Optional[str] = None'
    ),
    lines(
      '# Admin',
      'FIRST_SUPERUSER_EMAIL: EmailStr',
      'FIRST_SUPERUSER_PASSWORD: str'
    ),
    lines(
      'class Config:',
      '    case_sensitive = True',
      '    env_file = ".env"'
    )
  );

  return finalize(lines(
    'from typing import List, Optional',
    '',
    'from pydantic import EmailStr, field_validator',
    'from pydantic_settings import BaseSettings',
    '',
    '',
    'class Settings(BaseSettings):',
    indent(fields, 4),
    '',
    '',
    'settings = Settings()'
  ));
}

export const SECURITY_MODULE = `from datetime import datetime, timedelta
from typing import Any, Optional, Union

from jose import jwt
from passlib.context import CryptContext

from app.core.config import settings

pwd_context = CryptContext(schemes=["bcrypt"], deprecated="auto")


def create_access_token(
    subject: Union[str, Any], expires_delta: Optional[timedelta] = None
) -> str:
    if expires_delta:
        expire = datetime.utcnow() + expires_delta
    else:
        expire = datetime.utcnow() + timedelta(
            minutes=settings.ACCESS_TOKEN_EXPIRE_MINUTES
        )

    to_encode = {"exp": expire, "sub": str(subject)}
    return jwt.encode(to_encode, settings.SECRET_KEY, algorithm=settings.ALGORITHM)


def verify_password(plain_password: str, hashed_password: str) -> bool:
    return pwd_context.verify(plain_password, hashed_password)


def get_password_hash(password: str) -> str:
    return pwd_context.hash(password)
`;

export const LOGGER_MODULE = `import sys

from loguru import logger

from app.core.config import settings


def setup_logging():
    logger.remove()

    log_level = "DEBUG" if settings.ENVIRONMENT == "development" else "INFO"

    logger.add(
        sys.stderr,
        format="<green>{time:YYYY-MM-DD HH:mm:ss.SSS}</green> | <level>{level: <8}</level> | <cyan>{name}</cyan>:<cyan>{function}</cyan>:<cyan>{line}</cyan> - <level>{message}</level>",
        level=log_level,
        colorize=True,
    )

    logger.add(
        "logs/app.log",
        rotation="10 MB",
        retention="1 week",
        level=log_level,
        format="{time:YYYY-MM-DD HH:mm:ss.SSS} | {level: <8} | {name}:{function}:{line} - {message}",
    )

    return logger


log = setup_logging()
`;
