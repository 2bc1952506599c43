/**
 * Embedded application entry point and API layer
 */

import type { ProjectConfig } from '../../types.js';
import { finalize, lines, when, whenBackgroundTasks, whenCache, whenDatabase } from '../fragments.js';

export function renderApiDependencies(config: ProjectConfig): string {
  const withDatabase = whenDatabase(config);

  return finalize(lines(
    'from fastapi import Depends, HTTPException, status',
    'from fastapi.security import HTTPAuthorizationCredentials, HTTPBearer',
    'from jose import JWTError, jwt',
    when(withDatabase, 'from sqlalchemy.orm import Session'),
    '',
    'from app.core.config import settings',
    when(withDatabase, 'from app.db.session import get_db'),
    '',
    'security = HTTPBearer()',
    '',
    '',
    'async def get_current_user(',
    '    credentials: HTTPAuthorizationCredentials = Depends(security),',
    when(withDatabase, '    db: Session = Depends(get_db),'),
    '):',
    '    token = credentials.credentials',
    '    credentials_exception = HTTPException(',
    '        status_code=status.HTTP_401_UNAUTHORIZED,',
    '        detail="Could not validate credentials",',
    '        headers={"WWW-Authenticate": "Bearer"},',
    '    )',
    '',
    '    try:',
    '        payload = jwt.decode(token, settings.SECRET_KEY, algorithms=[settings.ALGORITHM])',
    '        user_id: str = payload.get("sub")',
    '        if user_id is None:',
    '            raise credentials_exception',
    '    except JWTError:',
    '        raise credentials_exception',
    '',
    '    return {"user_id": user_id}'
  ));
}

export function renderMainModule(config: ProjectConfig): string {
  const withRateLimit = whenCache(config);

  return finalize(lines(
    'import time',
    '',
    'from fastapi import FastAPI, Request',
    'from fastapi.middleware.cors import CORSMiddleware',
    when(withRateLimit, 'from slowapi import Limiter, _rate_limit_exceeded_handler'),
    when(withRateLimit, 'from slowapi.errors import RateLimitExceeded'),
    when(withRateLimit, 'from slowapi.util import get_remote_address'),
    'from starlette.middleware.base import BaseHTTPMiddleware',
    '',
    'from app.api.v1.api import api_router',
    'from app.core.config import settings',
    'from app.core.logger import log',
    '',
    '',
    'class LoggingMiddleware(BaseHTTPMiddleware):',
    '    async def dispatch(self, request: Request, call_next):',
    '        start_time = time.time()',
    '        response = await call_next(request)',
    '        process_time = time.time() - start_time',
    '',
    '        log.info(',
    '            f"{request.method} {request.url.path} "',
    '            f"completed in {process_time:.4f}s with status {response.status_code}"',
    '        )',
    '',
    '        return response',
    '',
    '',
    'app = FastAPI(',
    '    title=settings.PROJECT_NAME,',
    '    version=settings.VERSION,',
    '    openapi_url=f"{settings.API_V1_STR}/openapi.json",',
    '    docs_url=f"{settings.API_V1_STR}/docs",',
    '    redoc_url=f"{settings.API_V1_STR}/redoc",',
    ')',
    '',
    'app.add_middleware(',
    '    CORSMiddleware,',
    '    allow_origins=settings.BACKEND_CORS_ORIGINS,',
    '    allow_credentials=True,',
    '    allow_methods=["*"],',
    '    allow_headers=["*"],',
    ')',
    'app.add_middleware(LoggingMiddleware)',
    when(withRateLimit, () => lines(
      '',
      'limiter = Limiter(key_func=get_remote_address, storage_uri=settings.REDIS_URL)',
      'app.state.limiter = limiter',
      'app.add_exception_handler(RateLimitExceeded, _rate_limit_exceeded_handler)'
    )),
    '',
    'app.include_router(api_router, prefix=settings.API_V1_STR)',
    '',
    '',
    '@app.get("/")',
    'def root():',
    '    return {',
    '        "message": f"Welcome to {settings.PROJECT_NAME} API",',
    '        "version": settings.VERSION,',
    '        "docs": f"{settings.API_V1_STR}/docs",',
    '    }',
    '',
    '',
    '@app.get("/health")',
    'def health_check():',
    '    return {"status": "healthy"}',
    '',
    '',
    'if __name__ == "__main__":',
    '    import uvicorn',
    '',
    '    uvicorn.run(',
    '        "app.main:app",',
    '        host="0.0.0.0",',
    '        port=settings.SERVER_PORT,',
    '        reload=settings.ENVIRONMENT == "development",',
    '    )'
  ));
}

export function renderApiRouter(config: ProjectConfig): string {
  const withTasks = whenBackgroundTasks(config);

  return finalize(lines(
    'from fastapi import APIRouter',
    '',
    withTasks ? 'from app.api.v1.endpoints import health, tasks' : 'from app.api.v1.endpoints import health',
    '',
    'api_router = APIRouter()',
    '',
    'api_router.include_router(health.router, prefix="/health", tags=["health"])',
    when(withTasks, 'api_router.include_router(tasks.router, prefix="/tasks", tags=["tasks"])')
  ));
}

export const HEALTH_ENDPOINT = `from datetime import datetime

from fastapi import APIRouter

router = APIRouter()


@router.get("")
def health_check():
    return {
        "status": "ok",
        "timestamp": datetime.utcnow().isoformat(),
    }
`;
