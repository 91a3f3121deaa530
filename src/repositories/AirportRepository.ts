import { LatLon } from '../lib/geo';
import { airportRowSchema } from '../schemas/navdata.schemas';
import type { AirportRow } from '../schemas/navdata.schemas';
import type { Airport, AirportLookup } from '../types/navdata.types';
import logger from '../utils/logger';
import { InvalidAirportRowError } from './InvalidAirportRowError';

/**
 * The subset of pg-promise's database interface used for airport queries
 */
export interface NavdataQueryable {
  oneOrNone<T>(query: string, values?: unknown): Promise<T | null>;
  none(query: string, values?: unknown): Promise<null>;
}

const BOUNDING_BOX = 'box(point(left_lonx, bottom_laty), point(right_lonx, top_laty))';

/**
 * Airport queries against a simulator navigation database.
 *
 * Airports are matched by their bounding box, an axis-aligned rectangle in
 * longitude/latitude space. Edges are inclusive. Boxes are expected not to
 * overlap; if they do, the airport with the lowest airport_id is returned.
 */
class AirportRepository implements AirportLookup {
  private db: NavdataQueryable;

  constructor(db: NavdataQueryable) {
    this.db = db;
  }

  async findContaining(position: LatLon): Promise<Airport | null> {
    const query = `
      SELECT airport_id, ident, laty, lonx, left_lonx, right_lonx, bottom_laty, top_laty
      FROM airport
      WHERE ${BOUNDING_BOX} @> point($1, $2)
      ORDER BY airport_id
      LIMIT 1;
    `;
    const row = await this.db.oneOrNone<unknown>(query, [position.longitude(), position.latitude()]);
    if (!row) {
      return null;
    }

    const parsed = airportRowSchema.safeParse(row);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      logger.error('Malformed airport row in navigation database', { issues });
      throw new InvalidAirportRowError(issues);
    }
    return AirportRepository.toAirport(parsed.data);
  }

  /**
   * Create the spatial index used by findContaining if it does not exist yet
   */
  async ensureSpatialIndex(): Promise<void> {
    await this.db.none(`
      CREATE INDEX IF NOT EXISTS idx_airport_bounding_box
      ON airport USING GIST (${BOUNDING_BOX});
    `);
    logger.info('Airport spatial index ready');
  }

  static toAirport(row: AirportRow): Airport {
    const airport: Airport = {
      id: row.airport_id,
      ident: row.ident,
      position: new LatLon(row.laty, row.lonx),
    };

    const {
      left_lonx: left, right_lonx: right, bottom_laty: bottom, top_laty: top,
    } = row;
    if (left != null && right != null && bottom != null && top != null) {
      airport.bounds = {
        left, right, bottom, top,
      };
    }
    return airport;
  }
}

export default AirportRepository;
