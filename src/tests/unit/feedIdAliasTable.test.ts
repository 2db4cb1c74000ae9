import { FeedIdAliasTable } from '../../services/feeds/feedIdAliasTable';
import { ZERO_FEED_ID, encodeFeedId } from '../../services/feeds/feedId';
import {
  AliasNotFoundError,
  ArrayLengthMismatchError,
  SameIdentifierError,
  ValidationError
} from '../../middleware/errorHandler';

const A = encodeFeedId({ category: 1, name: 'A/USD' });
const B = encodeFeedId({ category: 1, name: 'B/USD' });
const C = encodeFeedId({ category: 1, name: 'C/USD' });
const D = encodeFeedId({ category: 1, name: 'D/USD' });

describe('FeedIdAliasTable', () => {
  let table: FeedIdAliasTable;

  beforeEach(() => {
    table = new FeedIdAliasTable();
  });

  describe('Resolution', () => {
    it('should return unchanged ids as they are', () => {
      expect(table.resolve(A)).toBe(A);
      expect(table.getAlias(A)).toBe(ZERO_FEED_ID);
    });

    it('should follow a single hop only', () => {
      table.change([A, B], [B, C]);

      expect(table.resolve(A)).toBe(B);
      expect(table.resolve(B)).toBe(C);
      expect(table.resolveAll([A, B, C])).toEqual([B, C, C]);
    });
  });

  describe('Changes', () => {
    it('should add, update and remove aliases in order', () => {
      const applied = table.change([A, B], [C, D]);
      expect(applied).toEqual([
        { oldFeedId: A, newFeedId: C },
        { oldFeedId: B, newFeedId: D }
      ]);

      table.change([A], [D]);
      expect(table.getAlias(A)).toBe(D);
      expect(table.positionOf(A)).toBe(1);

      table.change([A], [ZERO_FEED_ID]);
      expect(table.getAlias(A)).toBe(ZERO_FEED_ID);
      expect(table.listChanged()).toEqual([B]);
      expect(table.positionOf(B)).toBe(1);
    });

    it('should return to the original state after adding then removing', () => {
      table.change([A], [B]);
      table.change([A], [ZERO_FEED_ID]);

      expect(table.listChanges()).toEqual([]);
      expect(table.resolve(A)).toBe(A);
    });

    it('should lowercase ids before storing them', () => {
      table.change([A.toUpperCase().replace('0X', '0x')], [B]);
      expect(table.resolve(A)).toBe(B);
    });

    it('should reject arrays of different lengths', () => {
      expect(() => table.change([A, B], [C])).toThrow(ArrayLengthMismatchError);
    });

    it('should reject mapping an id to itself', () => {
      expect(() => table.change([A], [A])).toThrow(SameIdentifierError);
    });

    it('should reject removing an alias that does not exist', () => {
      expect(() => table.change([A], [ZERO_FEED_ID])).toThrow(AliasNotFoundError);
    });

    it('should reject malformed ids', () => {
      expect(() => table.change(['0x01'], [B])).toThrow(ValidationError);
    });
  });

  describe('Snapshots', () => {
    it('should restore the aliases present when the snapshot was taken', () => {
      table.change([A], [B]);
      const snapshot = table.snapshot();
      table.change([C, A], [D, ZERO_FEED_ID]);

      table.restore(snapshot);

      expect(table.listChanges()).toEqual([{ oldFeedId: A, newFeedId: B }]);
    });
  });
});
