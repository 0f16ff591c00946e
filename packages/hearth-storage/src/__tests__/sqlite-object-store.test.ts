/**
 * SQLiteObjectStore Tests
 *
 * - Schema created once, reopened idempotently
 * - Foreign keys enforced and cascaded by SQLite itself
 * - place_amenity junction rows mirror Place.amenity_ids
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { SQLiteObjectStore } from '../backends/sqlite';
import { ConstraintViolationError } from '../errors';
import { Amenity, City, Place, Review, State, User } from '../models';
import { RelationshipResolver } from '../relations';

describe('SQLiteObjectStore', () => {
  let dir: string;
  let dbPath: string;
  let store: SQLiteObjectStore;

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'hearth-sqlite-'));
    dbPath = path.join(dir, 'hearth.db');
    store = new SQLiteObjectStore({ dbPath });
    await store.reload();
  });

  afterEach(async () => {
    await store.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function countRows(table: string): number {
    const db = new Database(dbPath);
    try {
      const row = db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get();
      return row ? row.n : 0;
    } finally {
      db.close();
    }
  }

  async function seedGraph() {
    const state = new State({ name: 'California' });
    const city = new City({ state_id: state.id, name: 'San Francisco' });
    const user = new User({ email: 'host@example.com', password: 'test-secret' });
    const amenity = new Amenity({ name: 'Wifi' });
    const place = new Place({ city_id: city.id, user_id: user.id, name: 'Loft' });
    const review = new Review({ place_id: place.id, user_id: user.id, text: 'Great stay' });
    for (const entity of [state, city, user, amenity, place, review]) {
      store.add(entity);
    }
    await store.save();
    return { state, city, user, amenity, place, review };
  }

  it('should initialize with WAL mode', () => {
    expect(fs.existsSync(dbPath)).toBe(true);
    expect(fs.existsSync(dbPath + '-wal')).toBe(true);
  });

  it('should create every table once across reloads', async () => {
    await store.reload();
    await store.reload();
    await store.close();

    const db = new Database(dbPath);
    const tables = db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
      .all()
      .map(row => row.name);
    db.close();

    expect(tables).toEqual(['amenities', 'cities', 'place_amenity', 'places', 'reviews', 'states', 'users']);
  });

  it('should reject a dangling foreign key and keep the change pending', async () => {
    const city = new City({ state_id: 'missing-state', name: 'Nowhere' });
    store.add(city);

    await expect(store.save()).rejects.toBeInstanceOf(ConstraintViolationError);
    await expect(store.save()).rejects.toMatchObject({
      code: 'CONSTRAINT_VIOLATION',
      sqliteCode: 'SQLITE_CONSTRAINT_FOREIGNKEY'
    });
    expect(city.isNew).toBe(true);
    expect(store.get('City', city.id)).toBe(city);
  });

  it('should write nothing from a failed flush', async () => {
    const state = new State({ name: 'Nevada' });
    store.add(state);
    store.add(new City({ state_id: 'missing-state', name: 'Nowhere' }));

    await expect(store.save()).rejects.toBeInstanceOf(ConstraintViolationError);
    await store.close();

    expect(countRows('states')).toBe(0);
  });

  it('should keep updated_at when a flush fails', async () => {
    const { state, city } = await seedGraph();
    const stamp = city.updated_at.getTime();

    city.update({ state_id: 'missing-state' });
    await expect(store.save()).rejects.toBeInstanceOf(ConstraintViolationError);
    await expect(store.save()).rejects.toBeInstanceOf(ConstraintViolationError);

    expect(city.updated_at.getTime()).toBe(stamp);
    expect(city.isDirty).toBe(true);

    city.update({ state_id: state.id });
    await store.save();

    expect(city.updated_at.getTime()).toBeGreaterThan(stamp);
  });

  it('should reject a new child of a parent deleted in the same flush', async () => {
    const { state } = await seedGraph();

    store.delete(state);
    store.add(new City({ state_id: state.id, name: 'Sacramento' }));

    await expect(store.save()).rejects.toMatchObject({
      code: 'CONSTRAINT_VIOLATION',
      sqliteCode: 'SQLITE_CONSTRAINT_FOREIGNKEY'
    });
    await store.close();

    expect(countRows('states')).toBe(1);
    expect(countRows('cities')).toBe(1);
  });

  it('should move a re-parented row before its old parent cascades', async () => {
    const { state, city, place, amenity } = await seedGraph();
    const other = new State({ name: 'Oregon' });
    store.add(other);
    new RelationshipResolver(store).linkAmenity(place, amenity);
    await store.save();

    city.update({ state_id: other.id });
    store.delete(state);
    await store.save();
    await store.close();

    expect(countRows('states')).toBe(1);
    expect(countRows('cities')).toBe(1);
    expect(countRows('places')).toBe(1);
    expect(countRows('reviews')).toBe(1);
    expect(countRows('place_amenity')).toBe(1);
  });

  it('should keep one junction row per linked pair', async () => {
    const { place, amenity } = await seedGraph();
    const resolver = new RelationshipResolver(store);

    resolver.linkAmenity(place, amenity);
    await store.save();
    resolver.linkAmenity(place, amenity);
    await store.save();
    await store.close();

    expect(countRows('place_amenity')).toBe(1);
  });

  it('should cascade deleted rows through foreign keys', async () => {
    const { state, place, amenity } = await seedGraph();
    new RelationshipResolver(store).linkAmenity(place, amenity);
    await store.save();

    store.delete(state);
    await store.save();
    await store.close();

    expect(countRows('states')).toBe(0);
    expect(countRows('cities')).toBe(0);
    expect(countRows('places')).toBe(0);
    expect(countRows('reviews')).toBe(0);
    expect(countRows('place_amenity')).toBe(0);
    expect(countRows('users')).toBe(1);
    expect(countRows('amenities')).toBe(1);
  });

  it('should hand out the same instance for the same row', async () => {
    const { city } = await seedGraph();
    await store.reload();

    const first = store.get('City', city.id);
    const [second] = store.filterBy('City', 'state_id', city.state_id);
    expect(first).not.toBeNull();
    expect(second).toBe(first);
  });

  it('should follow an in-memory re-parenting before it is saved', async () => {
    const { state, city } = await seedGraph();
    const other = new State({ name: 'Oregon' });
    store.add(other);

    city.update({ state_id: other.id });

    expect(store.filterBy('City', 'state_id', state.id)).toEqual([]);
    expect(store.filterBy('City', 'state_id', other.id)).toEqual([city]);
  });

  it('should throw when used before reload()', () => {
    const unopened = new SQLiteObjectStore({ dbPath: path.join(dir, 'other.db') });

    expect(() => unopened.get('State', 'any')).toThrow('Database not initialized');
    expect(() => unopened.count()).toThrow('Database not initialized');
  });
});
