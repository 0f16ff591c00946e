import { EntityValidationError } from '../errors';
import {
  Amenity,
  Place,
  State,
  User,
  createEntity,
  hashPassword,
  hydrate,
  isEntityKind,
  keyOf,
  objectKey
} from '../models';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('Entity models', () => {
  describe('identity and timestamps', () => {
    it('should issue a fresh v4 id and equal timestamps', () => {
      const state = new State({ name: 'California' });

      expect(state.id).toMatch(UUID_V4);
      expect(state.created_at).toBeInstanceOf(Date);
      expect(state.updated_at.getTime()).toBe(state.created_at.getTime());
      expect(state.isNew).toBe(true);
      expect(state.isDirty).toBe(true);
    });

    it('should never reuse an id', () => {
      const ids = new Set(Array.from({ length: 50 }, () => new Amenity().id));
      expect(ids.size).toBe(50);
    });

    it('should default attributes that were not supplied', () => {
      const place = new Place({ name: 'Loft' });

      expect(place.number_rooms).toBe(0);
      expect(place.price_by_night).toBe(0);
      expect(place.description).toBeNull();
      expect(place.latitude).toBeNull();
      expect(place.amenity_ids).toEqual([]);
    });
  });

  describe('update()', () => {
    it('should ignore reserved and unknown keys', () => {
      const state = new State({ id: 'chosen-id', name: 'California' });
      const { id, created_at } = state;

      const applied = state.update({
        id: 'other-id',
        created_at: '2001-01-01T00:00:00.000Z',
        updated_at: '2001-01-01T00:00:00.000Z',
        __class__: 'City',
        colour: 'blue',
        name: 'Cali'
      });

      expect(applied).toEqual(['name']);
      expect(state.id).toBe(id);
      expect(state.id).not.toBe('chosen-id');
      expect(state.created_at).toBe(created_at);
      expect(state.name).toBe('Cali');
      expect(state.toRecord()).not.toHaveProperty('colour');
    });

    it('should coerce numeric strings on typed attributes', () => {
      const place = new Place({ name: 'Loft' });

      place.update({ number_rooms: '3', price_by_night: '150', latitude: '37.5' });

      expect(place.number_rooms).toBe(3);
      expect(place.price_by_night).toBe(150);
      expect(place.latitude).toBe(37.5);
    });

    it('should reject values that cannot be coerced and leave the entity unchanged', () => {
      const place = new Place({ name: 'Loft', number_rooms: 2 });

      expect(() => place.update({ name: 'Studio', number_rooms: 'many' })).toThrow(EntityValidationError);
      expect(place.name).toBe('Loft');
      expect(place.number_rooms).toBe(2);
    });

    it('should report the failing attribute', () => {
      try {
        new Place({ max_guest: -1 });
        throw new Error('expected a validation error');
      } catch (error) {
        expect(error).toBeInstanceOf(EntityValidationError);
        if (!(error instanceof EntityValidationError)) return;
        expect(error.code).toBe('ENTITY_INVALID');
        expect(error.issues[0].path).toEqual(['max_guest']);
        expect(error.message).toMatch(/^Invalid Place attributes: max_guest: /);
      }
    });

    it('should not coerce non-strings into string attributes', () => {
      expect(() => new State({ name: 42 })).toThrow(EntityValidationError);
    });
  });

  describe('User', () => {
    it('should store a SHA-256 digest of the password', () => {
      const user = new User({ email: 'guest@example.com', password: 'test-secret' });

      expect(user.password).toBe(hashPassword('test-secret'));
      expect(user.password).toMatch(/^[0-9a-f]{64}$/);
      expect(user.checkPassword('test-secret')).toBe(true);
      expect(user.checkPassword('wrong')).toBe(false);
    });

    it('should re-hash a password set through update()', () => {
      const user = new User({ email: 'guest@example.com', password: 'test-secret' });

      user.update({ password: 'another-secret' });

      expect(user.checkPassword('another-secret')).toBe(true);
    });

    it('should hide the password from toDict() but keep it in toRecord()', () => {
      const user = new User({ email: 'guest@example.com', password: 'test-secret', first_name: 'Ada' });

      expect(user.toDict()).toEqual({
        __class__: 'User',
        id: user.id,
        created_at: user.created_at.toISOString(),
        updated_at: user.updated_at.toISOString(),
        email: 'guest@example.com',
        first_name: 'Ada',
        last_name: null
      });
      expect(user.toRecord().password).toBe(hashPassword('test-secret'));
    });
  });

  describe('Place amenity links', () => {
    it('should link each amenity once, in order', () => {
      const place = new Place({ name: 'Loft' });

      expect(place.linkAmenity('a')).toBe(true);
      expect(place.linkAmenity('b')).toBe(true);
      expect(place.linkAmenity('a')).toBe(false);

      expect(place.amenity_ids).toEqual(['a', 'b']);
      expect(place.hasLinkChanges).toBe(true);
    });

    it('should report unlinking an absent amenity', () => {
      const place = new Place({ name: 'Loft' });
      place.linkAmenity('a');

      expect(place.unlinkAmenity('b')).toBe(false);
      expect(place.unlinkAmenity('a')).toBe(true);
      expect(place.amenity_ids).toEqual([]);
    });

    it('should copy the id list into its mappings', () => {
      const place = new Place({ name: 'Loft' });
      place.linkAmenity('a');

      const dict = place.toDict();
      expect(dict.amenity_ids).toEqual(['a']);

      place.linkAmenity('b');
      expect(dict.amenity_ids).toEqual(['a']);
    });

    it('should not take amenity_ids from caller attributes', () => {
      const place = new Place({ name: 'Loft', amenity_ids: ['a'] });

      expect(place.amenity_ids).toEqual([]);
    });
  });

  describe('save stamping', () => {
    it('should keep updated_at on the first save', () => {
      const state = new State({ name: 'California' });
      const stamp = state.updated_at.toISOString();

      const record = state.recordForSave();
      state.markPersisted();

      expect(record.updated_at).toBe(stamp);
      expect(state.updated_at.toISOString()).toBe(stamp);
    });

    it('should advance updated_at for a changed stored entity once written', () => {
      const state = new State({ name: 'California' });
      state.markPersisted();
      const stamp = state.updated_at.getTime();

      state.update({ name: 'Cali' });
      const record = state.recordForSave();

      expect(Date.parse(record.updated_at)).toBeGreaterThan(stamp);
      expect(state.updated_at.getTime()).toBe(stamp);

      state.markPersisted();

      expect(state.updated_at.toISOString()).toBe(record.updated_at);
      expect(state.isDirty).toBe(false);
    });

    it('should not move updated_at when a write is never confirmed', () => {
      const state = new State({ name: 'California' });
      state.markPersisted();
      const stamp = state.updated_at.getTime();
      state.update({ name: 'Cali' });

      state.recordForSave();
      state.recordForSave();

      expect(state.updated_at.getTime()).toBe(stamp);
      expect(state.isDirty).toBe(true);
    });

    it('should leave an unchanged stored entity alone', () => {
      const state = new State({ name: 'California' });
      state.markPersisted();
      const stamp = state.updated_at.toISOString();

      const record = state.recordForSave();
      state.markPersisted();

      expect(record.updated_at).toBe(stamp);
      expect(state.updated_at.toISOString()).toBe(stamp);
      expect(state.isNew).toBe(false);
      expect(state.isDirty).toBe(false);
    });
  });

  describe('hydrate()', () => {
    const stored = {
      id: 'user-1',
      created_at: '2024-03-01T10:00:00.000Z',
      updated_at: '2024-03-02T10:00:00.000Z'
    };

    it('should restore identity and timestamps from the record', () => {
      const entity = hydrate({ __class__: 'State', ...stored, name: 'Ohio' });

      expect(entity).toBeInstanceOf(State);
      expect(entity.id).toBe('user-1');
      expect(entity.created_at.toISOString()).toBe('2024-03-01T10:00:00.000Z');
      expect(entity.updated_at.toISOString()).toBe('2024-03-02T10:00:00.000Z');
      expect(entity.isNew).toBe(false);
      expect(entity.isDirty).toBe(false);
    });

    it('should not re-hash a stored password digest', () => {
      const digest = hashPassword('test-secret');
      const entity = hydrate({ __class__: 'User', ...stored, email: 'guest@example.com', password: digest });

      expect(entity).toBeInstanceOf(User);
      expect(entity.toRecord().password).toBe(digest);
    });

    it('should restore amenity links without duplicates', () => {
      const entity = hydrate({ __class__: 'Place', ...stored, name: 'Loft', amenity_ids: ['a', 'b', 'a'] });

      expect(entity.toDict().amenity_ids).toEqual(['a', 'b']);
    });

    it('should reject an unknown kind', () => {
      expect(() => hydrate({ __class__: 'Planet', ...stored })).toThrow(EntityValidationError);
    });

    it('should reject a record without identity', () => {
      expect(() => hydrate({ __class__: 'State', name: 'Ohio' })).toThrow(EntityValidationError);
      expect(() => hydrate('State.1')).toThrow(EntityValidationError);
    });

    it('should reject a malformed timestamp', () => {
      expect(() => hydrate({ __class__: 'State', ...stored, created_at: 'yesterday' })).toThrow(
        EntityValidationError
      );
    });
  });

  describe('registry helpers', () => {
    it('should create an entity by kind name', () => {
      const amenity = createEntity('Amenity', { name: 'Pool' });

      expect(amenity).toBeInstanceOf(Amenity);
      expect(amenity.kind).toBe('Amenity');
      expect(amenity.name).toBe('Pool');
    });

    it('should recognise kind names', () => {
      expect(isEntityKind('Review')).toBe(true);
      expect(isEntityKind('review')).toBe(false);
      expect(isEntityKind('BaseModel')).toBe(false);
    });

    it('should build "<Kind>.<id>" keys', () => {
      const state = new State({ name: 'Ohio' });

      expect(objectKey('City', 'abc')).toBe('City.abc');
      expect(keyOf(state)).toBe(`State.${state.id}`);
    });
  });
});
