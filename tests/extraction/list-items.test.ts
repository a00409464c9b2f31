import { describe, it, expect } from '@jest/globals';
import { LIST_STYLE_ORDER, extractListItems } from '../../src/extraction/list-items.js';

describe('list item segmentation', () => {
  it('extracts numbered items with dot and paren markers', () => {
    const text = '\n1. First item here\n2) Second item here\n3. Third item here';
    expect(extractListItems(text, 'numbered')).toEqual([
      'First item here',
      'Second item here',
      'Third item here',
    ]);
  });

  it('keeps continuation lines inside the item', () => {
    const text = '1. Starts here\n   and continues\n2. Next one';
    expect(extractListItems(text, 'numbered')).toEqual(['Starts here\n   and continues', 'Next one']);
  });

  it('stops an item at a blank line', () => {
    const text = '1. Only this part\n\nTrailing paragraph';
    expect(extractListItems(text, 'numbered')).toEqual(['Only this part']);
  });

  it('extracts dash and star bullets', () => {
    const text = '- dash bullet\n* star bullet';
    expect(extractListItems(text, 'bulleted')).toEqual(['dash bullet', 'star bullet']);
  });

  it('tries numbered items before bullets', () => {
    expect(LIST_STYLE_ORDER).toEqual(['numbered', 'bulleted']);
  });

  it('finds only the markers of the requested style', () => {
    const text = '- a bullet\n\n1. a number';
    expect(extractListItems(text, 'numbered')).toEqual(['a number']);
    expect(extractListItems(text, 'bulleted')).toEqual(['a bullet']);
  });

  it('returns nothing for plain prose', () => {
    expect(extractListItems('Nothing listed here.', 'numbered')).toEqual([]);
    expect(extractListItems('Nothing listed here.', 'bulleted')).toEqual([]);
  });
});
