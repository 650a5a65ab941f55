// Timestamps are ISO-8601 UTC strings; specifications are JSON objects.
export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS asset_categories (
    id          TEXT PRIMARY KEY,
    name        TEXT NOT NULL UNIQUE,
    color       TEXT NOT NULL DEFAULT '#6366f1',
    icon        TEXT NOT NULL DEFAULT 'box',
    description TEXT
  );

  CREATE TABLE IF NOT EXISTS teams (
    id         TEXT PRIMARY KEY,
    name       TEXT NOT NULL UNIQUE,
    department TEXT,
    budget     REAL NOT NULL DEFAULT 0,
    headcount  INTEGER NOT NULL DEFAULT 0
  );

  CREATE TABLE IF NOT EXISTS projects (
    id         TEXT PRIMARY KEY,
    name       TEXT NOT NULL,
    team_id    TEXT REFERENCES teams (id),
    status     TEXT NOT NULL DEFAULT 'planning'
               CHECK (status IN ('planning', 'active', 'on_hold', 'completed', 'cancelled')),
    priority   TEXT NOT NULL DEFAULT 'medium'
               CHECK (priority IN ('low', 'medium', 'high', 'critical')),
    start_date TEXT,
    end_date   TEXT,
    budget     REAL NOT NULL DEFAULT 0
  );

  CREATE TABLE IF NOT EXISTS project_requirements (
    id              TEXT PRIMARY KEY,
    project_id      TEXT NOT NULL REFERENCES projects (id) ON DELETE CASCADE,
    category_id     TEXT NOT NULL REFERENCES asset_categories (id),
    quantity_needed INTEGER NOT NULL DEFAULT 1,
    priority        TEXT NOT NULL DEFAULT 'required'
                    CHECK (priority IN ('required', 'preferred', 'optional')),
    min_specs       TEXT NOT NULL DEFAULT '{}',
    notes           TEXT
  );

  CREATE TABLE IF NOT EXISTS assets (
    id               TEXT PRIMARY KEY,
    name             TEXT NOT NULL,
    asset_tag        TEXT UNIQUE,
    category_id      TEXT REFERENCES asset_categories (id),
    status           TEXT NOT NULL DEFAULT 'available'
                     CHECK (status IN ('available', 'in_use', 'maintenance', 'retired')),
    specifications   TEXT NOT NULL DEFAULT '{}',
    cost_per_hour    REAL NOT NULL DEFAULT 0,
    cost_per_day     REAL NOT NULL DEFAULT 0,
    utilization_rate REAL NOT NULL DEFAULT 0,
    total_hours_used REAL NOT NULL DEFAULT 0,
    current_team_id  TEXT REFERENCES teams (id),
    last_used_at     TEXT,
    version          INTEGER NOT NULL DEFAULT 0
  );

  CREATE TABLE IF NOT EXISTS allocations (
    id                TEXT PRIMARY KEY,
    asset_id          TEXT NOT NULL REFERENCES assets (id),
    team_id           TEXT NOT NULL REFERENCES teams (id),
    project_id        TEXT REFERENCES projects (id),
    allocated_at      TEXT NOT NULL,
    released_at       TEXT,
    status            TEXT NOT NULL DEFAULT 'active'
                      CHECK (status IN ('active', 'released', 'overdue')),
    actual_hours_used REAL NOT NULL DEFAULT 0
  );

  CREATE UNIQUE INDEX IF NOT EXISTS allocations_one_open_per_asset
    ON allocations (asset_id) WHERE released_at IS NULL;

  CREATE TABLE IF NOT EXISTS usage_logs (
    id         TEXT PRIMARY KEY,
    asset_id   TEXT NOT NULL REFERENCES assets (id),
    team_id    TEXT REFERENCES teams (id),
    project_id TEXT REFERENCES projects (id),
    action     TEXT NOT NULL
               CHECK (action IN ('allocated', 'released', 'maintenance_start', 'maintenance_end', 'status_change')),
    hours_used REAL NOT NULL DEFAULT 0,
    logged_at  TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS usage_logs_logged_at ON usage_logs (logged_at);
`;
