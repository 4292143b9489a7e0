/**
 * Tests for the strategy registry
 */

import {
  StrategyRegistry,
  DuplicateDiscriminatorError,
  UnknownDiscriminatorError,
  normalizeDiscriminator,
} from '../src/registry';

interface Greeter {
  greet(name: string): string;
}

class EmailGreeter implements Greeter {
  greet(name: string): string {
    return `email:${name}`;
  }
}

class SmsGreeter implements Greeter {
  greet(name: string): string {
    return `sms:${name}`;
  }
}

describe('StrategyRegistry', () => {
  let registry: StrategyRegistry<Greeter>;

  beforeEach(() => {
    registry = new StrategyRegistry<Greeter>({ name: 'channel' });
  });

  describe('normalizeDiscriminator', () => {
    it('should lower-case the discriminator', () => {
      expect(normalizeDiscriminator('Email')).toBe('email');
      expect(normalizeDiscriminator('SMS')).toBe('sms');
    });
  });

  describe('register', () => {
    it('should add a discriminator', () => {
      registry.register('email', () => new EmailGreeter());

      expect(registry.has('email')).toBe(true);
      expect(registry.size).toBe(1);
    });

    it('should store discriminators normalized', () => {
      registry.register('Email', () => new EmailGreeter());

      expect(registry.discriminators()).toEqual(['email']);
    });

    it('should reject a duplicate discriminator', () => {
      registry.register('email', () => new EmailGreeter());

      expect(() => registry.register('email', () => new SmsGreeter())).toThrow(DuplicateDiscriminatorError);
    });

    it('should reject a duplicate that differs only in case', () => {
      registry.register('email', () => new EmailGreeter());

      let caught: unknown;
      try {
        registry.register('EMAIL', () => new SmsGreeter());
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(DuplicateDiscriminatorError);
      if (caught instanceof DuplicateDiscriminatorError) {
        expect(caught.discriminator).toBe('email');
        expect(caught.registryName).toBe('channel');
        expect(caught.message).toBe('channel: "email" is already registered');
      }
    });

    it('should keep the first registration after a rejected duplicate', () => {
      registry.register('email', () => new EmailGreeter());
      expect(() => registry.register('Email', () => new SmsGreeter())).toThrow();

      expect(registry.create('email').greet('ada')).toBe('email:ada');
      expect(registry.size).toBe(1);
    });
  });

  describe('create', () => {
    beforeEach(() => {
      registry.register('email', () => new EmailGreeter());
      registry.register('sms', () => new SmsGreeter());
    });

    it('should return an instance behaving like the constructor result', () => {
      const greeter = registry.create('email');

      expect(greeter).toBeInstanceOf(EmailGreeter);
      expect(greeter.greet('ada')).toBe(new EmailGreeter().greet('ada'));
    });

    it('should resolve discriminators case-insensitively', () => {
      registry.register('Push', () => ({ greet: (name: string) => `push:${name}` }));

      expect(registry.create('PUSH').greet('ada')).toBe('push:ada');
      expect(registry.create('push').greet('ada')).toBe('push:ada');
      expect(registry.create('EMAIL')).toBeInstanceOf(EmailGreeter);
    });

    it('should construct a new instance on every call', () => {
      const first = registry.create('sms');
      const second = registry.create('sms');

      expect(first).not.toBe(second);
    });

    it('should invoke the constructor once per create', () => {
      const construct = jest.fn(() => new EmailGreeter());
      registry.register('tracked', construct);

      registry.create('tracked');
      registry.create('Tracked');

      expect(construct).toHaveBeenCalledTimes(2);
    });

    it('should throw UnknownDiscriminatorError with the valid discriminators', () => {
      let caught: unknown;
      try {
        registry.create('push');
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(UnknownDiscriminatorError);
      if (caught instanceof UnknownDiscriminatorError) {
        expect(caught.requested).toBe('push');
        expect(caught.valid).toEqual(['email', 'sms']);
        expect(caught.registryName).toBe('channel');
        expect(caught.message).toBe('Unknown channel: push. Available: email, sms');
      }
    });

    it('should keep the caller spelling in the error', () => {
      expect(() => registry.create('Fax')).toThrow('Unknown channel: Fax. Available: email, sms');
    });

    it('should not match partial discriminators', () => {
      expect(() => registry.create('em')).toThrow(UnknownDiscriminatorError);
      expect(() => registry.create('email ')).toThrow(UnknownDiscriminatorError);
    });

    it('should report an empty registry', () => {
      const empty = new StrategyRegistry<Greeter>({ name: 'channel' });

      let caught: unknown;
      try {
        empty.create('email');
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(UnknownDiscriminatorError);
      if (caught instanceof UnknownDiscriminatorError) {
        expect(caught.valid).toEqual([]);
        expect(caught.message).toBe('Unknown channel: email. Registry is empty');
      }
    });

    it('should not mutate the registry', () => {
      const before = registry.discriminators();

      registry.create('email');
      registry.create('email');
      expect(() => registry.create('push')).toThrow();

      expect(registry.discriminators()).toEqual(before);
      expect(() => registry.register('push', () => new SmsGreeter())).not.toThrow();
      expect(registry.discriminators()).toEqual(['email', 'push', 'sms']);
    });

    it('should propagate errors thrown by a constructor', () => {
      registry.register('broken', () => {
        throw new Error('cannot build');
      });

      expect(() => registry.create('broken')).toThrow('cannot build');
      expect(registry.has('broken')).toBe(true);
    });
  });

  describe('discriminators', () => {
    it('should list discriminators sorted', () => {
      registry.register('sms', () => new SmsGreeter());
      registry.register('Email', () => new EmailGreeter());

      expect(registry.discriminators()).toEqual(['email', 'sms']);
    });

    it('should return a copy', () => {
      registry.register('sms', () => new SmsGreeter());
      registry.discriminators().push('fax');

      expect(registry.discriminators()).toEqual(['sms']);
    });
  });
});
