import { Pool, types } from 'pg';
import type { AppConfig } from '@mailq/shared';

// BIGSERIAL ids and COUNT(*) arrive as int8; they stay well inside Number range.
types.setTypeParser(types.builtins.INT8, (value: string) =>
  Number.parseInt(value, 10),
);

export function createPool(config: AppConfig['database']): Pool {
  return new Pool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    max: config.poolMax,
  });
}
