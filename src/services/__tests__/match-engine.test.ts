import { describe, expect, it } from 'vitest';
import { ConfigurationError, InvariantError } from '../../errors.js';
import type { LogicalUnit } from '../../shared/types/media-record.js';
import { createUnit } from '../live-pair-resolver.js';
import { classify, metadataAgreement } from '../match-engine.js';
import { at, makeRecord } from './record-fixtures.js';

const ZERO_HASH = '0000000000000000';

describe('classify', () => {
  it('matches a renamed byte-identical file exactly and reports the other as missing', () => {
    const a = createUnit(makeRecord('/amazon/A.jpg', { contentHash: 'h1' }));
    const b = createUnit(
      makeRecord('/amazon/B.jpg', {
        contentHash: 'h2',
        dimensions: { width: 3000, height: 2000 },
        capturedAt: at('2023-05-01T00:00:00Z')
      })
    );
    const aPrime = createUnit(makeRecord('/icloud/renamed.jpg', { contentHash: 'h1' }));

    const [first, second] = classify([a, b], [aPrime]);

    expect(first.status).toBe('matched');
    expect(first.strategy).toBe('exact');
    expect(first.confidence).toBe(1);
    expect(first.status === 'matched' && first.matchedUnit).toBe(aPrime);
    expect(second.status).toBe('missing');
    expect(second.strategy).toBe('none');
    expect(second.confidence).toBe(0);
  });

  it('prefers the exact tier over an earlier metadata-only candidate', () => {
    const shared = { capturedAt: at('2023-05-01T10:00:00Z'), dimensions: { width: 4032, height: 3024 }, byteSize: 2048 };
    const amazon = createUnit(makeRecord('/amazon/IMG_1.HEIC', { contentHash: 'same', ...shared }));
    const metadataTwin = createUnit(makeRecord('/icloud/IMG_9.HEIC', { contentHash: 'other', ...shared }));
    const exactTwin = createUnit(
      makeRecord('/icloud/IMG_1.HEIC', { contentHash: 'same', capturedAt: at('2020-01-01T00:00:00Z'), byteSize: 2048 })
    );

    const [record] = classify([amazon], [metadataTwin, exactTwin]);

    expect(record.status).toBe('matched');
    expect(record.strategy).toBe('exact');
    expect(record.status === 'matched' && record.matchedUnit).toBe(exactTwin);
  });

  it('reports a Live Photo missing when iCloud only holds its motion clip', () => {
    const amazon = createUnit(
      makeRecord('/amazon/IMG_0001.HEIC', { contentHash: 'still-unique' }),
      makeRecord('/amazon/IMG_0001.MOV', { contentHash: 'motion' })
    );
    const icloud = createUnit(makeRecord('/icloud/IMG_0001.MOV', { contentHash: 'motion' }));

    const [record] = classify([amazon], [icloud]);

    expect(record.status).toBe('missing');
    expect(record.strategy).toBe('none');
  });

  it('matches a Live Photo when iCloud holds both the still and the motion clip', () => {
    const amazon = createUnit(
      makeRecord('/amazon/IMG_0001.HEIC', { contentHash: 'still' }),
      makeRecord('/amazon/IMG_0001.MOV', { contentHash: 'motion' })
    );
    const icloud = createUnit(
      makeRecord('/icloud/IMG_0001.HEIC', { contentHash: 'still' }),
      makeRecord('/icloud/IMG_0001.MOV', { contentHash: 'motion' })
    );

    const [record] = classify([amazon], [icloud]);

    expect(record.status).toBe('matched');
    expect(record.strategy).toBe('exact');
    expect(record.status === 'matched' && record.matchedUnit).toBe(icloud);
  });

  it('reports a Live Photo missing when iCloud holds the still without any motion clip', () => {
    const amazon = createUnit(
      makeRecord('/amazon/IMG_0001.HEIC', { contentHash: 'still' }),
      makeRecord('/amazon/IMG_0001.MOV', { contentHash: 'motion' })
    );
    const icloud = createUnit(makeRecord('/icloud/IMG_0001.HEIC', { contentHash: 'still' }));

    const [record] = classify([amazon], [icloud]);

    expect(record.status).toBe('missing');
    expect(record.reason).toBe(
      'still matched by exact but motion companion /amazon/IMG_0001.MOV is not in iCloud library'
    );
  });

  it('accepts a motion clip that iCloud keeps as a separate item', () => {
    const amazon = createUnit(
      makeRecord('/amazon/IMG_0001.HEIC', { contentHash: 'still' }),
      makeRecord('/amazon/IMG_0001.MOV', { contentHash: 'motion' })
    );
    const still = createUnit(makeRecord('/icloud/photos/IMG_0001.HEIC', { contentHash: 'still' }));
    const clip = createUnit(makeRecord('/icloud/videos/IMG_0001.MOV', { contentHash: 'motion' }));

    const [record] = classify([amazon], [clip, still]);

    expect(record.status).toBe('matched');
    expect(record.status === 'matched' && record.matchedUnit).toBe(still);
  });

  it('matches a still through a JPEG rendition kept beside an iCloud HEIC', () => {
    const amazon = createUnit(makeRecord('/amazon/IMG_0001.JPG', { contentHash: 'jpeg-copy' }));
    const icloud = createUnit(makeRecord('/icloud/IMG_0001.HEIC', { contentHash: 'heic' }), undefined, [
      makeRecord('/icloud/IMG_0001.JPG', { contentHash: 'jpeg-copy' })
    ]);

    const [record] = classify([amazon], [icloud]);

    expect(record.strategy).toBe('exact');
    expect(record.status === 'matched' && record.matchedUnit).toBe(icloud);
  });

  it('matches at a perceptual distance equal to the threshold and sends one bit more to review', () => {
    const amazon = createUnit(makeRecord('/amazon/a.jpg', { perceptualHash: ZERO_HASH, byteSize: 1 }));
    const atThreshold = createUnit(makeRecord('/icloud/b.jpg', { perceptualHash: '000000000000001f', byteSize: 2 }));
    const beyond = createUnit(makeRecord('/icloud/c.jpg', { perceptualHash: '000000000000003f', byteSize: 3 }));

    const [matched] = classify([amazon], [atThreshold], 5);
    const [review] = classify([amazon], [beyond], 5);

    expect(matched.status).toBe('matched');
    expect(matched.strategy).toBe('perceptual');
    expect(matched.confidence).toBe(1 - 5 / 64);
    expect(matched.status === 'matched' && matched.distance).toBe(5);
    expect(review.status).toBe('uncertain');
    expect(review.confidence).toBe(0.5 - 1 / 59);
    expect(review.status === 'uncertain' && review.candidates).toEqual([beyond]);
  });

  it('reports a perceptual distance beyond the review band as missing', () => {
    const amazon = createUnit(makeRecord('/amazon/a.jpg', { perceptualHash: ZERO_HASH, byteSize: 1 }));
    const atCeiling = createUnit(makeRecord('/icloud/b.jpg', { perceptualHash: '00000000000003ff', byteSize: 2 }));
    const beyond = createUnit(makeRecord('/icloud/c.jpg', { perceptualHash: '00000000000007ff', byteSize: 3 }));

    const [review] = classify([amazon], [atCeiling]);
    const [missing] = classify([amazon], [beyond]);

    expect(review.status).toBe('uncertain');
    expect(review.confidence).toBe(0.5 - 5 / 59);
    expect(missing.status).toBe('missing');
  });

  it('lists every near-miss candidate at the closest distance', () => {
    const amazon = createUnit(makeRecord('/amazon/a.jpg', { perceptualHash: ZERO_HASH, byteSize: 1 }));
    const first = createUnit(makeRecord('/icloud/x.jpg', { perceptualHash: '000000000000007f', byteSize: 2 }));
    const farther = createUnit(makeRecord('/icloud/y.jpg', { perceptualHash: '00000000000000ff', byteSize: 3 }));
    const second = createUnit(makeRecord('/icloud/z.jpg', { perceptualHash: '7f00000000000000', byteSize: 4 }));

    const [record] = classify([amazon], [first, farther, second]);

    expect(record.status === 'uncertain' && record.candidates).toEqual([first, second]);
    expect(record.reason).toBe('perceptual hash distance 7 is above 5 but within 10');
  });

  it('prefers a metadata match over a perceptual near miss', () => {
    const fields = { capturedAt: at('2023-05-01T10:00:00Z'), byteSize: 999 };
    const amazon = createUnit(makeRecord('/amazon/a.jpg', { ...fields, perceptualHash: ZERO_HASH }));
    const icloud = createUnit(makeRecord('/icloud/b.jpg', { ...fields, perceptualHash: '00000000000000ff' }));

    const [record] = classify([amazon], [icloud]);

    expect(record.status).toBe('matched');
    expect(record.strategy).toBe('metadata');
  });

  it('turns the review band off when its ceiling equals the match threshold', () => {
    const amazon = createUnit(makeRecord('/amazon/a.jpg', { perceptualHash: ZERO_HASH, byteSize: 1 }));
    const beyond = createUnit(makeRecord('/icloud/c.jpg', { perceptualHash: '000000000000003f', byteSize: 3 }));

    const [record] = classify([amazon], [beyond], 5, { perceptualUncertainThreshold: 5 });

    expect(record.status).toBe('missing');
  });

  it('picks the closest perceptual candidate and breaks ties by iCloud order', () => {
    const amazon = createUnit(makeRecord('/amazon/a.jpg', { perceptualHash: ZERO_HASH, byteSize: 1 }));
    const far = createUnit(makeRecord('/icloud/far.jpg', { perceptualHash: '0000000000000007', byteSize: 2 }));
    const nearFirst = createUnit(makeRecord('/icloud/near1.jpg', { perceptualHash: '0000000000000001', byteSize: 3 }));
    const nearSecond = createUnit(makeRecord('/icloud/near2.jpg', { perceptualHash: '1000000000000000', byteSize: 4 }));

    const [record] = classify([amazon], [far, nearFirst, nearSecond]);

    expect(record.status === 'matched' && record.matchedUnit).toBe(nearFirst);
  });

  it('falls through to metadata when perceptual hashes are absent', () => {
    const fields = { capturedAt: at('2023-05-01T10:00:00Z'), dimensions: { width: 3000, height: 2000 }, byteSize: 5000 };
    const amazon = createUnit(makeRecord('/amazon/a.jpg', fields));
    const icloud = createUnit(makeRecord('/icloud/z.jpg', { ...fields, capturedAt: at('2023-05-01T10:00:30Z') }));

    const [record] = classify([amazon], [icloud]);

    expect(record.status).toBe('matched');
    expect(record.strategy).toBe('metadata');
    expect(record.confidence).toBe(0.9);
  });

  it('gives two agreeing metadata fields a lower confidence', () => {
    const amazon = createUnit(makeRecord('/amazon/a.mov', { capturedAt: at('2023-05-01T10:00:00Z'), byteSize: 777 }));
    const icloud = createUnit(makeRecord('/icloud/b.mov', { capturedAt: at('2023-05-01T10:00:00Z'), byteSize: 777 }));

    const [record] = classify([amazon], [icloud]);

    expect(record.strategy).toBe('metadata');
    expect(record.confidence).toBe(0.6);
  });

  it('never matches a photo to a video on metadata alone', () => {
    const fields = { capturedAt: at('2023-05-01T10:00:00Z'), byteSize: 777 };
    const amazon = createUnit(makeRecord('/amazon/a.jpg', fields));
    const icloud = createUnit(makeRecord('/icloud/b.mov', fields));

    const [record] = classify([amazon], [icloud]);

    expect(record.status).toBe('missing');
  });

  it('counts an agreeing video duration towards the metadata score', () => {
    const fields = { capturedAt: at('2023-05-01T10:00:00Z'), byteSize: 777 };
    const amazon = createUnit(makeRecord('/amazon/a.mov', { ...fields, durationMs: 3_000 }));
    const close = createUnit(makeRecord('/icloud/b.mov', { ...fields, durationMs: 3_900 }));
    const drifted = createUnit(makeRecord('/icloud/c.mov', { ...fields, durationMs: 4_500 }));

    const [matched] = classify([amazon], [close]);
    const [rejected] = classify([amazon], [drifted]);
    const [lenient] = classify([amazon], [drifted], undefined, { videoDurationToleranceMs: 2_000 });

    expect(matched.strategy).toBe('metadata');
    expect(matched.confidence).toBe(0.9);
    expect(rejected.status).toBe('missing');
    expect(lenient.status).toBe('matched');
  });

  it('does not match files that agree only on byte size', () => {
    const amazon = createUnit(
      makeRecord('/amazon/a.jpg', {
        byteSize: 4096,
        capturedAt: at('2023-05-01T10:00:00Z'),
        dimensions: { width: 100, height: 100 }
      })
    );
    const icloud = createUnit(
      makeRecord('/icloud/b.jpg', {
        byteSize: 4096,
        capturedAt: at('2021-02-03T04:05:06Z'),
        dimensions: { width: 200, height: 150 }
      })
    );

    const [record] = classify([amazon], [icloud]);

    expect(record.status).toBe('missing');
  });

  it('reports equally good metadata candidates as uncertain', () => {
    const fields = { capturedAt: at('2023-05-01T10:00:00Z'), byteSize: 999 };
    const amazon = createUnit(makeRecord('/amazon/a.jpg', fields));
    const first = createUnit(makeRecord('/icloud/x.jpg', fields));
    const second = createUnit(makeRecord('/icloud/y.jpg', fields));

    const [record] = classify([amazon], [first, second]);

    expect(record.status).toBe('uncertain');
    expect(record.strategy).toBe('none');
    expect(record.confidence).toBe(0.6);
    expect(record.status === 'uncertain' && record.candidates).toEqual([first, second]);
  });

  it('resolves a metadata tie in favour of the candidate agreeing on more fields', () => {
    const fields = { capturedAt: at('2023-05-01T10:00:00Z'), byteSize: 999 };
    const amazon = createUnit(makeRecord('/amazon/a.jpg', { ...fields, dimensions: { width: 10, height: 20 } }));
    const partial = createUnit(makeRecord('/icloud/x.jpg', fields));
    const full = createUnit(makeRecord('/icloud/y.jpg', { ...fields, dimensions: { width: 10, height: 20 } }));

    const [record] = classify([amazon], [partial, full]);

    expect(record.status === 'matched' && record.matchedUnit).toBe(full);
    expect(record.confidence).toBe(0.9);
  });

  it('is deterministic across repeated runs', () => {
    const fields = { capturedAt: at('2023-05-01T10:00:00Z'), byteSize: 999 };
    const amazon = [
      createUnit(makeRecord('/amazon/a.jpg', { contentHash: 'h1' })),
      createUnit(makeRecord('/amazon/b.jpg', { perceptualHash: ZERO_HASH })),
      createUnit(makeRecord('/amazon/c.jpg', fields))
    ];
    const icloud = [
      createUnit(makeRecord('/icloud/a.jpg', { contentHash: 'h1' })),
      createUnit(makeRecord('/icloud/b.jpg', { perceptualHash: '0000000000000003' })),
      createUnit(makeRecord('/icloud/c1.jpg', fields)),
      createUnit(makeRecord('/icloud/c2.jpg', fields))
    ];

    expect(classify(amazon, icloud)).toEqual(classify(amazon, icloud));
    expect(classify(amazon, icloud).map((record) => record.status)).toEqual(['matched', 'matched', 'uncertain']);
  });

  it('preserves Amazon input order', () => {
    const amazon = ['/amazon/3.jpg', '/amazon/1.jpg', '/amazon/2.jpg'].map((path) => createUnit(makeRecord(path)));

    const records = classify(amazon, []);

    expect(records.map((record) => record.unit.primary.path)).toEqual(['/amazon/3.jpg', '/amazon/1.jpg', '/amazon/2.jpg']);
  });

  it('rejects a negative perceptual threshold', () => {
    expect(() => classify([], [], -1)).toThrow(ConfigurationError);
    expect(() => classify([], [], 5, { videoDurationToleranceMs: -1 })).toThrow(ConfigurationError);
  });

  it('treats a unit without a primary record as a defect', () => {
    const broken: LogicalUnit = JSON.parse('{"key":"x","isLivePhoto":false}');

    expect(() => classify([broken], [])).toThrow(InvariantError);
  });
});

describe('metadataAgreement', () => {
  it('counts only fields present on both sides', () => {
    const a = makeRecord('/a.jpg', { capturedAt: at('2023-05-01T10:00:00Z'), dimensions: { width: 1, height: 2 } });
    const b = makeRecord('/b.jpg', { capturedAt: at('2023-05-01T10:00:59Z') });

    expect(metadataAgreement(a, b, 60_000)).toBe(2);
    expect(metadataAgreement(a, b, 1_000)).toBe(0);
  });

  it('compares durations only when both records carry one', () => {
    const a = makeRecord('/a.mov', { durationMs: 10_000 });
    const b = makeRecord('/b.mov', { durationMs: 10_800 });
    const c = makeRecord('/c.mov');

    expect(metadataAgreement(a, b, 0)).toBe(2);
    expect(metadataAgreement(a, b, 0, 500)).toBe(0);
    expect(metadataAgreement(a, c, 0)).toBe(1);
  });
});
