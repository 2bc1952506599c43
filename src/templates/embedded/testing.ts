/**
 * Embedded test harness: pytest fixtures, a smoke test and pytest.ini
 */

import type { ProjectConfig } from '../../types.js';
import { whenDatabase } from '../fragments.js';

const CONFTEST_WITH_DATABASE = `import pytest
from fastapi.testclient import TestClient
from sqlalchemy import create_engine
from sqlalchemy.orm import sessionmaker

from app.db.base import Base
from app.db.session import get_db
from app.main import app

SQLALCHEMY_TEST_URL = "sqlite:///./test.db"
engine = create_engine(SQLALCHEMY_TEST_URL, connect_args={"check_same_thread": False})
TestingSessionLocal = sessionmaker(autocommit=False, autoflush=False, bind=engine)


@pytest.fixture(scope="function")
def db():
    Base.metadata.create_all(bind=engine)
    session = TestingSessionLocal()
    try:
        yield session
    finally:
        session.close()
        Base.metadata.drop_all(bind=engine)


@pytest.fixture(scope="function")
def client(db):
    def override_get_db():
        yield db

    app.dependency_overrides[get_db] = override_get_db
    with TestClient(app) as test_client:
        yield test_client
    app.dependency_overrides.clear()
`;

const CONFTEST_WITHOUT_DATABASE = `import pytest
from fastapi.testclient import TestClient

from app.main import app


@pytest.fixture(scope="function")
def client():
    with TestClient(app) as test_client:
        yield test_client
`;

export function renderConftest(config: ProjectConfig): string {
  return whenDatabase(config) ? CONFTEST_WITH_DATABASE : CONFTEST_WITHOUT_DATABASE;
}

export const HEALTH_TEST = `def test_health_check(client):
    response = client.get("/health")
    assert response.status_code == 200
    assert response.json()["status"] == "healthy"


def test_root(client):
    response = client.get("/")
    assert response.status_code == 200
    assert "message" in response.json()
`;

export const PYTEST_INI = `[pytest]
testpaths = tests
python_files = test_*.py
python_functions = test_*
addopts =
    -v
    --strict-markers
    --cov=app
    --cov-report=term-missing
    --cov-report=html
`;
