/**
 * SessionAttributes and InMemorySessionStore Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { deserializeAttributes, serializeAttributes } from '../session-attributes.js';
import { InMemorySessionStore, InMemorySessionStoreFactory } from '../in-memory-session-store.js';
import { asLogger, createMockLogger, type MockLogger } from './fixtures.js';

describe('SessionAttributes', () => {
  let session: InMemorySessionStore;

  beforeEach(() => {
    session = new InMemorySessionStore('session-1');
  });

  describe('get/put', () => {
    it('should address nested values with dot keys', () => {
      session.put('signup.email', 'ada@example.com');

      expect(session.get('signup')).toEqual({ email: 'ada@example.com' });
      expect(session.get('signup.email')).toBe('ada@example.com');
    });

    it('should return the fallback for absent keys', () => {
      session.put('signup', { name: 'Ada' });

      expect(session.get('missing')).toBeUndefined();
      expect(session.get('missing', 'x')).toBe('x');
      expect(session.get('signup.email', null)).toBeNull();
      expect(session.get('signup.name.first', 'x')).toBe('x');
    });

    it('should replace a scalar on the path with an object', () => {
      session.put('signup', 'scalar');
      session.put('signup.form_step', 2);

      expect(session.get('signup')).toEqual({ form_step: 2 });
    });

    it('should keep sibling values when writing a nested key', () => {
      session.put('signup', { name: 'Ada', form_step: 1 });
      session.put('signup.form_step', 2);

      expect(session.get('signup')).toEqual({ name: 'Ada', form_step: 2 });
    });

    it('should reject keys with an empty leaf', () => {
      expect(() => session.put('signup.', 1)).toThrow(RangeError);
    });

    it('should refuse keys that reach the prototype chain', () => {
      expect(() => session.put('__proto__.polluted', true)).toThrow(RangeError);
      expect(() => session.put('signup.constructor.prototype.polluted', true)).toThrow(RangeError);
      expect(() => session.forget('__proto__.toString')).toThrow(RangeError);

      expect(Object.hasOwn(Object.prototype, 'polluted')).toBe(false);
      expect(session.all()).toEqual({});
    });

    it('should not read inherited properties', () => {
      expect(session.get('constructor', 'none')).toBe('none');
      expect(session.get('signup.__proto__', 'none')).toBe('none');
    });
  });

  describe('increment', () => {
    it('should count absent values from zero', () => {
      expect(session.increment('visits')).toBe(1);
      expect(session.increment('visits', 4)).toBe(5);
    });

    it('should treat non-numeric values as zero', () => {
      session.put('signup.form_step', 'two');

      expect(session.increment('signup.form_step')).toBe(1);
    });
  });

  describe('forget', () => {
    it('should remove nested and top-level keys', () => {
      session.put('signup', { name: 'Ada', email: 'ada@example.com' });
      session.forget('signup.email');

      expect(session.get('signup')).toEqual({ name: 'Ada' });

      session.forget('signup');
      expect(session.all()).toEqual({});
    });

    it('should ignore absent keys', () => {
      session.forget('nothing.here');

      expect(session.all()).toEqual({});
    });
  });

  it('should return a deep copy from all', () => {
    session.put('signup.name', 'Ada');
    const snapshot = session.all();
    snapshot['signup'] = 'changed';

    expect(session.get('signup.name')).toBe('Ada');
  });
});

describe('deserializeAttributes', () => {
  it('should parse a serialized object', () => {
    expect(deserializeAttributes(serializeAttributes({ signup: { form_step: 2 } }))).toEqual({
      signup: { form_step: 2 },
    });
  });

  it('should reject invalid JSON and non-object payloads', () => {
    expect(deserializeAttributes('{not json')).toBeNull();
    expect(deserializeAttributes('[1,2]')).toBeNull();
    expect(deserializeAttributes('"text"')).toBeNull();
    expect(deserializeAttributes('null')).toBeNull();
  });
});

describe('InMemorySessionStoreFactory', () => {
  let logger: MockLogger;
  let factory: InMemorySessionStoreFactory;

  beforeEach(() => {
    logger = createMockLogger();
    factory = new InMemorySessionStoreFactory({ logger: asLogger(logger) });
  });

  it('should open an empty session for an unknown id', async () => {
    const session = await factory.open('unknown');

    expect(session.id).toBe('unknown');
    expect(session.all()).toEqual({});
    expect(factory.size).toBe(0);
  });

  it('should only persist saved changes', async () => {
    const first = await factory.open('session-1');
    first.put('signup.name', 'Ada');

    expect((await factory.open('session-1')).all()).toEqual({});

    await first.save();
    expect((await factory.open('session-1')).all()).toEqual({ signup: { name: 'Ada' } });
    expect(factory.size).toBe(1);
  });

  it('should give each open its own copy', async () => {
    const first = await factory.open('session-1');
    first.put('signup.name', 'Ada');
    await first.save();

    const second = await factory.open('session-1');
    second.put('signup.name', 'Grace');

    expect(first.get('signup.name')).toBe('Ada');
  });

  it('should destroy sessions', async () => {
    const session = await factory.open('session-1');
    await session.save();

    await expect(factory.destroy('session-1')).resolves.toBe(true);
    await expect(factory.destroy('session-1')).resolves.toBe(false);
  });

  it('should clear sessions on close', async () => {
    await (await factory.open('session-1')).save();
    await factory.close();

    expect(factory.size).toBe(0);
    expect(logger.info).toHaveBeenCalledWith('In-memory session store closed');
  });
});
