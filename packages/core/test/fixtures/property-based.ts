import fc from 'fast-check';

const leaf = fc.oneof(
  fc.integer(),
  fc.boolean(),
  fc.string({ maxLength: 8 }),
  fc.constant(null)
);

export const settingNameArbitrary = fc.stringMatching(/^[a-z][a-z0-9_]{0,7}$/);

/** Arbitrary JSON-like config trees of small depth */
export const { tree: configTreeArbitrary } = fc.letrec((tie) => ({
  tree: fc.oneof(
    { depthSize: 'small', withCrossShrink: true },
    leaf,
    tie('list'),
    tie('mapping')
  ),
  list: fc.array(tie('tree'), { maxLength: 4 }),
  mapping: fc.dictionary(settingNameArbitrary, tie('tree'), { maxKeys: 4 }),
}));

export const serviceSchema = {
  type: 'object',
  required: ['host', 'port'],
  properties: {
    host: { type: 'string', default: 'localhost' },
    port: { type: 'integer', default: 8080 },
    tls: {
      type: 'object',
      default: {},
      properties: {
        enabled: { type: 'boolean', default: false },
        ciphers: { type: 'array', items: { type: 'string' }, default: ['aes'] },
      },
    },
    workers: {
      type: 'array',
      items: {
        type: 'object',
        default: { threads: 2 },
        properties: { threads: { type: 'integer' } },
      },
    },
  },
};

/** Valid service configs with any subset of settings left out */
export const partialServiceArbitrary = fc.record(
  {
    host: fc.string({ maxLength: 12 }),
    port: fc.integer({ min: 1, max: 65_535 }),
    tls: fc.record(
      {
        enabled: fc.boolean(),
        ciphers: fc.array(fc.constantFrom('aes', 'chacha'), { maxLength: 2 }),
      },
      { requiredKeys: [] }
    ),
    workers: fc.array(
      fc.record({ threads: fc.integer({ min: 1, max: 64 }) }, { requiredKeys: [] }),
      { maxLength: 3 }
    ),
  },
  { requiredKeys: [] }
);
