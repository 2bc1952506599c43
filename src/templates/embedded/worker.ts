/**
 * Embedded background-task worker: the Celery application, an example task
 * and the endpoint that enqueues it.
 */

import type { ProjectConfig } from '../../types.js';
import { pythonString } from './core.js';

export function renderWorkerModule(config: ProjectConfig): string {
  return `from celery import Celery

from app.core.config import settings

celery_app = Celery(
    ${pythonString(config.slug)},
    broker=settings.CELERY_BROKER_URL,
    backend=settings.CELERY_RESULT_BACKEND,
    include=["app.tasks.example"],
)

celery_app.conf.update(
    task_serializer="json",
    accept_content=["json"],
    result_serializer="json",
    timezone="UTC",
    enable_utc=True,
)
`;
}

export const EXAMPLE_TASK_MODULE = `from app.core.logger import log
from app.worker import celery_app


@celery_app.task(name="tasks.add")
def add(x: int, y: int) -> int:
    log.info(f"Adding {x} + {y}")
    return x + y
`;

export const TASKS_ENDPOINT = `from fastapi import APIRouter

from app.tasks.example import add
from app.worker import celery_app

router = APIRouter()


@router.post("/add")
def enqueue_add(x: int, y: int):
    result = add.delay(x, y)
    return {"task_id": result.id}


@router.get("/{task_id}")
def task_status(task_id: str):
    result = celery_app.AsyncResult(task_id)
    return {
        "task_id": task_id,
        "status": result.status,
        "result": result.result if result.ready() else None,
    }
`;
