import { describe, test, expect } from '@jest/globals';
import {
  CapacityError,
  DatasetError,
  DuplicateRegistrationError,
  LookupError,
  SimulationError,
} from '../errors.js';

describe('SimulationError', () => {
  test('subclasses keep their names and the base type', () => {
    const error = new DuplicateRegistrationError('already there', { kind: 'user', id: 2 });

    expect(error).toBeInstanceOf(LookupError);
    expect(error).toBeInstanceOf(SimulationError);
    expect(error.name).toBe('DuplicateRegistrationError');
  });

  test('added context never overrides what the error already carries', () => {
    const error = new CapacityError('full', { serviceId: 4, targetServerId: 2 });
    const returned = error.addContext({ step: 7, serviceId: 99 });

    expect(returned).toBe(error);
    expect(error.context).toEqual({ step: 7, serviceId: 4, targetServerId: 2 });
  });

  test('dataset errors carry their validation issues', () => {
    const error = new DatasetError('Invalid dataset', {}, ['users.0.path: Required']);
    expect(error.issues).toEqual(['users.0.path: Required']);
  });
});
