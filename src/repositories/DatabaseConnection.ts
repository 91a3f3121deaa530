import pgPromise from 'pg-promise';
import config from '../config';
import logger from '../utils/logger';
import type { SimChoice } from '../types/aircraft.types';
import type { NavdataDatabaseConfig } from '../types/config.types';

// Error throttling to prevent log flooding from the per-tick airport lookup
const errorThrottle = {
  lastError: '',
  lastErrorTime: 0,
  errorCount: 0,
  throttleMs: 5000,
};

const describeQuery = (query: unknown): string => (typeof query === 'string' ? query.substring(0, 100) : '');

const pgp = pgPromise({
  error: (err: Error, e) => {
    const now = Date.now();
    const query = describeQuery(e?.query);
    const errorKey = `${err.message}:${query.substring(0, 50)}`;

    if (errorKey === errorThrottle.lastError) {
      errorThrottle.errorCount += 1;
      if (now - errorThrottle.lastErrorTime < errorThrottle.throttleMs) {
        return;
      }
      logger.error(`Navigation database error (repeated x${errorThrottle.errorCount})`, {
        error: err.message,
        query,
      });
      errorThrottle.errorCount = 0;
    } else {
      logger.error('Navigation database query error', { error: err.message, query });
      errorThrottle.errorCount = 1;
    }

    errorThrottle.lastError = errorKey;
    errorThrottle.lastErrorTime = now;
  },
});

// eslint-disable-next-line @typescript-eslint/ban-types
export type NavdataDatabase = pgPromise.IDatabase<{}>;

/**
 * Read-only connection to a simulator's navigation database
 */
class DatabaseConnection {
  private db: NavdataDatabase;

  private readonly url: string;

  constructor(navdata: NavdataDatabaseConfig) {
    this.url = navdata.url;
    this.db = pgp({
      connectionString: navdata.url,
      max: navdata.pool.max,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
      query_timeout: 10000,
    });
  }

  /**
   * Verify the database is reachable before the recorder starts
   */
  async initConnection(): Promise<void> {
    const connection = await this.db.connect();
    connection.done();
    logger.info('Navigation database connection established', {
      database: DatabaseConnection.redact(this.url),
    });
  }

  getDb(): NavdataDatabase {
    return this.db;
  }

  async close(): Promise<void> {
    await this.db.$pool.end();
  }

  static redact(connectionString: string): string {
    try {
      const url = new URL(connectionString);
      if (url.password) {
        url.password = '***';
      }
      return url.toString();
    } catch {
      return '<invalid connection string>';
    }
  }
}

const connections = new Map<SimChoice, DatabaseConnection>();

/**
 * Get or create the navigation database connection for a simulator
 */
export function getConnection(sim: SimChoice): DatabaseConnection {
  let connection = connections.get(sim);
  if (!connection) {
    connection = new DatabaseConnection(config.database.navdata[sim]);
    connections.set(sim, connection);
  }
  return connection;
}

/**
 * Close every open navigation database pool
 */
export async function closeConnections(): Promise<void> {
  const open = [...connections.values()];
  connections.clear();
  await Promise.all(open.map((connection) => connection.close()));
  pgp.end();
}

export { DatabaseConnection };
