import Database from 'better-sqlite3';

// =============================================================================
// SQLite connection + schema
//
// One file-backed database per process (WAL). Tests pass ':memory:'.
// Uniqueness keys carry the store contracts:
//   routes         (origin, destination, airline)
//   market_demand  (route_id, date)   — last writer wins
//   insights       (title)            — first writer wins
// =============================================================================

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS routes (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    origin TEXT NOT NULL,
    destination TEXT NOT NULL,
    airline TEXT NOT NULL,
    distance_km INTEGER,
    UNIQUE (origin, destination, airline)
  );

  CREATE TABLE IF NOT EXISTS observations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    route_id INTEGER NOT NULL REFERENCES routes(id) ON DELETE CASCADE,
    flight_number TEXT NOT NULL,
    departure_time TEXT,
    arrival_time TEXT,
    price REAL,
    currency TEXT NOT NULL DEFAULT 'AUD',
    availability INTEGER NOT NULL DEFAULT 0,
    booking_class TEXT NOT NULL DEFAULT 'economy',
    captured_at TEXT NOT NULL,
    source TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_observations_captured ON observations (captured_at);
  CREATE INDEX IF NOT EXISTS idx_observations_departure ON observations (departure_time);

  CREATE TABLE IF NOT EXISTS market_demand (
    route_id INTEGER NOT NULL REFERENCES routes(id) ON DELETE CASCADE,
    date TEXT NOT NULL,
    search_volume INTEGER NOT NULL,
    average_price REAL NOT NULL,
    price_trend TEXT NOT NULL,
    demand_level TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    PRIMARY KEY (route_id, date)
  );

  CREATE TABLE IF NOT EXISTS insights (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL UNIQUE,
    description TEXT NOT NULL,
    insight_type TEXT NOT NULL,
    confidence REAL NOT NULL,
    generated_by TEXT NOT NULL,
    created_at TEXT NOT NULL
  );
`;

export function openDatabase(filename: string): Database.Database {
  const db = new Database(filename);
  if (filename !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  db.exec(SCHEMA);
  return db;
}
