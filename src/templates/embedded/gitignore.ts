/**
 * Embedded .gitignore Template Content
 * Standard Python service ignore patterns
 */

import type { ProjectConfig } from '../../types.js';
import { blocks, finalize, when, whenDatabase } from '../fragments.js';

const STANDARD_GITIGNORE = `# Byte-compiled / optimized / DLL files
__pycache__/
*.py[cod]
*$py.class

# C extensions
*.so

# Distribution / packaging
.Python
build/
develop-eggs/
dist/
downloads/
eggs/
.eggs/
lib/
lib64/
parts/
sdist/
var/
wheels/
*.egg-info/
.installed.cfg
*.egg

# PyInstaller
*.manifest
*.spec

# Unit test / coverage reports
htmlcov/
.tox/
.nox/
.coverage
.coverage.*
.cache
nosetests.xml
coverage.xml
*.cover
.hypothesis/
.pytest_cache/

# Environments
.env
.env.local
.venv
env/
venv/
ENV/
env.bak/
venv.bak/

# IDEs
.vscode/
.idea/
*.swp
*.swo
*~

# OS
.DS_Store
Thumbs.db

# Logs
logs/*
!logs/.gitkeep
*.log

# Local databases
*.db
*.sqlite
*.sqlite3

# mypy
.mypy_cache/
.dmypy.json
dmypy.json
`;

const MIGRATIONS_GITIGNORE = `# Alembic
alembic/versions/*.pyc
`;

/**
 * Get .gitignore content for the generated project
 */
export function renderGitignore(config: ProjectConfig): string {
  return finalize(blocks(
    STANDARD_GITIGNORE,
    when(whenDatabase(config), MIGRATIONS_GITIGNORE)
  ));
}
