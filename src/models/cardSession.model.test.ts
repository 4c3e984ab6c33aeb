import { describe, it, expect } from 'vitest';

import { CardSessionModel } from './cardSession.model.js';

describe('CardSessionModel indexes', () => {
  it('keys userId alone only on the unique pending-session index', () => {
    const userIdOnly = CardSessionModel.schema
      .indexes()
      .filter(
        ([fields]) =>
          Object.keys(fields).length === 1 && fields.userId === 1
      );

    expect(userIdOnly).toHaveLength(1);
    expect(userIdOnly[0][1]).toMatchObject({
      name: 'one_pending_per_user',
      unique: true,
      partialFilterExpression: { status: 'pending' },
    });
  });

  it('gives every index a distinct name', () => {
    const names = CardSessionModel.schema
      .indexes()
      .map(
        ([fields, options]) =>
          options.name ??
          Object.entries(fields)
            .map(([key, dir]) => `${key}_${String(dir)}`)
            .join('_')
      );

    expect(new Set(names).size).toBe(names.length);
  });
});
