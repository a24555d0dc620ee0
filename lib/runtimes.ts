import type { AppRuntime } from './models';
import type { UnitTemplate } from './systemctl';

export interface RuntimeProfile {
  runtime: AppRuntime;
  template: UnitTemplate;
  /** Non-secret environment every runtime command gets. */
  baseEnv: Record<string, string>;
  /** Installs production dependencies only. */
  install: string;
  /** Creates the database through the app itself; null means plain CREATE DATABASE. */
  createDatabase: string | null;
  migrate: string;
  /** Counts applied migrations in the output of `migrate`. */
  countMigrations: (output: string) => number;
  assets: string | null;
  /** Prints `db:ok` after a trivial query through the app's own stack. */
  dbCheck: string;
}

const rails: RuntimeProfile = {
  runtime: 'rails',
  template: 'rails',
  baseEnv: {
    RAILS_ENV: 'production',
    BUNDLE_WITHOUT: 'development:test',
  },
  install: [
    'bundle config set --local deployment true',
    "bundle config set --local without 'development test'",
    'bundle install --jobs 4',
  ].join(' && '),
  createDatabase: 'bundle exec rails db:create',
  migrate: 'bundle exec rails db:migrate',
  // "== 20260101120000 CreateHumidors: migrated (0.0123s) ==="
  countMigrations: (output) => (output.match(/^== \d+ \S+: migrated\b/gm) ?? []).length,
  assets: 'bundle exec rails assets:precompile',
  dbCheck: `bundle exec rails runner 'ActiveRecord::Base.connection.execute("SELECT 1"); puts "db:ok"'`,
};

const fastapi: RuntimeProfile = {
  runtime: 'fastapi',
  template: 'hms',
  baseEnv: {
    PYTHONUNBUFFERED: '1',
  },
  install: [
    'test -x .venv/bin/python || python3 -m venv .venv',
    '.venv/bin/pip install --quiet --upgrade pip',
    '.venv/bin/pip install --no-cache-dir -r requirements.txt',
  ].join(' && '),
  createDatabase: null,
  migrate: '.venv/bin/alembic upgrade head',
  // "INFO  [alembic.runtime.migration] Running upgrade abc -> def, add tasks"
  countMigrations: (output) => (output.match(/Running upgrade /g) ?? []).length,
  assets: null,
  // The service module (app_fastapi, as uvicorn loads it) exposes its SQLAlchemy engine.
  dbCheck: [
    '.venv/bin/python -c',
    `'from sqlalchemy import text; from app_fastapi import engine; engine.connect().execute(text("SELECT 1")); print("db:ok")'`,
  ].join(' '),
};

const profiles: Record<AppRuntime, RuntimeProfile> = { rails, fastapi };

export function runtimeProfile(runtime: AppRuntime): RuntimeProfile {
  return profiles[runtime];
}
