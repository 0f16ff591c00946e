/**
 * SQLITE schema: one table per entity kind, place_amenity junction table.
 * Foreign keys cascade deletes from owners to dependents.
 */

import type { EntityKind } from '../../models';

export interface TableDefinition {
  table: string;
  /** Columns after id/created_at/updated_at, in insert order */
  columns: readonly string[];
}

export const TABLES: { [K in EntityKind]: TableDefinition } = {
  State: { table: 'states', columns: ['name'] },
  City: { table: 'cities', columns: ['state_id', 'name'] },
  Amenity: { table: 'amenities', columns: ['name'] },
  User: { table: 'users', columns: ['email', 'password', 'first_name', 'last_name'] },
  Place: {
    table: 'places',
    columns: [
      'city_id',
      'user_id',
      'name',
      'description',
      'number_rooms',
      'number_bathrooms',
      'max_guest',
      'price_by_night',
      'latitude',
      'longitude'
    ]
  },
  Review: { table: 'reviews', columns: ['place_id', 'user_id', 'text'] }
};

export const JUNCTION_TABLE = 'place_amenity';

export const SCHEMA = `
  CREATE TABLE IF NOT EXISTS states (
    id VARCHAR(60) PRIMARY KEY,
    created_at DATETIME NOT NULL,
    updated_at DATETIME NOT NULL,
    name VARCHAR(128) NOT NULL
  );

  CREATE TABLE IF NOT EXISTS cities (
    id VARCHAR(60) PRIMARY KEY,
    created_at DATETIME NOT NULL,
    updated_at DATETIME NOT NULL,
    state_id VARCHAR(60) NOT NULL REFERENCES states(id) ON DELETE CASCADE,
    name VARCHAR(128) NOT NULL
  );

  CREATE TABLE IF NOT EXISTS amenities (
    id VARCHAR(60) PRIMARY KEY,
    created_at DATETIME NOT NULL,
    updated_at DATETIME NOT NULL,
    name VARCHAR(128) NOT NULL
  );

  CREATE TABLE IF NOT EXISTS users (
    id VARCHAR(60) PRIMARY KEY,
    created_at DATETIME NOT NULL,
    updated_at DATETIME NOT NULL,
    email VARCHAR(128) NOT NULL,
    password VARCHAR(128) NOT NULL,
    first_name VARCHAR(128),
    last_name VARCHAR(128)
  );

  CREATE TABLE IF NOT EXISTS places (
    id VARCHAR(60) PRIMARY KEY,
    created_at DATETIME NOT NULL,
    updated_at DATETIME NOT NULL,
    city_id VARCHAR(60) NOT NULL REFERENCES cities(id) ON DELETE CASCADE,
    user_id VARCHAR(60) NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    name VARCHAR(128) NOT NULL,
    description VARCHAR(1024),
    number_rooms INTEGER NOT NULL DEFAULT 0,
    number_bathrooms INTEGER NOT NULL DEFAULT 0,
    max_guest INTEGER NOT NULL DEFAULT 0,
    price_by_night INTEGER NOT NULL DEFAULT 0,
    latitude REAL,
    longitude REAL
  );

  CREATE TABLE IF NOT EXISTS reviews (
    id VARCHAR(60) PRIMARY KEY,
    created_at DATETIME NOT NULL,
    updated_at DATETIME NOT NULL,
    place_id VARCHAR(60) NOT NULL REFERENCES places(id) ON DELETE CASCADE,
    user_id VARCHAR(60) NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    text VARCHAR(1024) NOT NULL
  );

  CREATE TABLE IF NOT EXISTS place_amenity (
    place_id VARCHAR(60) NOT NULL REFERENCES places(id) ON DELETE CASCADE,
    amenity_id VARCHAR(60) NOT NULL REFERENCES amenities(id) ON DELETE CASCADE,
    PRIMARY KEY (place_id, amenity_id)
  );

  CREATE INDEX IF NOT EXISTS idx_cities_state_id ON cities(state_id);
  CREATE INDEX IF NOT EXISTS idx_places_city_id ON places(city_id);
  CREATE INDEX IF NOT EXISTS idx_places_user_id ON places(user_id);
  CREATE INDEX IF NOT EXISTS idx_reviews_place_id ON reviews(place_id);
  CREATE INDEX IF NOT EXISTS idx_reviews_user_id ON reviews(user_id);
  CREATE INDEX IF NOT EXISTS idx_place_amenity_amenity_id ON place_amenity(amenity_id);
`;
