import {
  ZERO_FEED_ID,
  decodeFeedId,
  encodeFeedId,
  encodeFeedIds,
  feedCategory,
  isCalculatedFeedId,
  isFeedId,
  isZeroFeedId,
  normalizeFeedId
} from '../../services/feeds/feedId';
import { ValidationError } from '../../middleware/errorHandler';

describe('feedId', () => {
  describe('Classification', () => {
    it('should treat exactly categories 32 to 63 as calculated', () => {
      for (let category = 0; category < 256; category++) {
        const feedId = '0x' + category.toString(16).padStart(2, '0') + '00'.repeat(20);
        expect(feedCategory(feedId)).toBe(category);
        expect(isCalculatedFeedId(feedId)).toBe(category >= 32 && category < 64);
      }
    });

    it('should recognise the zero feed id', () => {
      expect(ZERO_FEED_ID).toBe('0x' + '00'.repeat(21));
      expect(isZeroFeedId(ZERO_FEED_ID)).toBe(true);
      expect(isZeroFeedId(encodeFeedId({ category: 1, name: 'BTC/USD' }))).toBe(false);
    });

    it('should only accept 21 byte hex strings', () => {
      expect(isFeedId('0x' + 'ab'.repeat(21))).toBe(true);
      expect(isFeedId('0x' + 'ab'.repeat(20))).toBe(false);
      expect(isFeedId('ab'.repeat(21))).toBe(false);
      expect(isFeedId(42)).toBe(false);
    });
  });

  describe('Normalization', () => {
    it('should lowercase valid ids', () => {
      expect(normalizeFeedId('0x' + 'AB'.repeat(21))).toBe('0x' + 'ab'.repeat(21));
    });

    it('should reject malformed ids with the field name', () => {
      expect(() => normalizeFeedId('0x1234', 'feedIds[2]')).toThrow(ValidationError);
      try {
        normalizeFeedId('0x1234', 'feedIds[2]');
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.details).toEqual({ field: 'feedIds[2]' });
        }
      }
    });
  });

  describe('Encoding', () => {
    it('should encode the category byte followed by the padded name', () => {
      expect(encodeFeedId({ category: 1, name: 'BTC/USD' })).toBe(
        '0x01' + '4254432f555344' + '00'.repeat(13)
      );
    });

    it('should encode several ids in order', () => {
      expect(encodeFeedIds([
        { category: 1, name: 'A' },
        { category: 32, name: 'B' }
      ])).toEqual([
        '0x0141' + '00'.repeat(19),
        '0x2042' + '00'.repeat(19)
      ]);
    });

    it('should decode what it encodes', () => {
      const feedId = encodeFeedId({ category: 32, name: 'SFLR/USD' });
      expect(decodeFeedId(feedId)).toEqual({ category: 32, name: 'SFLR/USD' });
    });

    it('should accept a name of exactly 20 bytes', () => {
      const name = 'X'.repeat(20);
      expect(decodeFeedId(encodeFeedId({ category: 2, name }))).toEqual({ category: 2, name });
    });

    it('should reject names longer than 20 bytes', () => {
      expect(() => encodeFeedId({ category: 1, name: 'X'.repeat(21) })).toThrow('Feed name too long');
    });

    it('should reject categories outside a byte', () => {
      expect(() => encodeFeedId({ category: 256, name: 'BTC/USD' })).toThrow(ValidationError);
      expect(() => encodeFeedId({ category: -1, name: 'BTC/USD' })).toThrow(ValidationError);
    });
  });
});
