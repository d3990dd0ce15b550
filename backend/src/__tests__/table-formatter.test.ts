import { describe, it, expect } from 'vitest';
import { formatTable, titleLink } from '../services/table-formatter.ts';
import { article, newsRows } from './fixtures.ts';

describe('titleLink', () => {
  it('renders a markdown link', () => {
    expect(titleLink('Flood warning', 'https://example.com/a')).toBe('[Flood warning](https://example.com/a)');
  });

  it('keeps the bare title without a url', () => {
    expect(titleLink('Flood warning', '')).toBe('Flood warning');
  });
});

describe('formatTable', () => {
  it('orders newest first with undated rows last and ties in subset order', () => {
    const links = formatTable(newsRows()).map(r => r.titleLink);
    expect(links).toEqual([6, 3, 1, 2, 5, 0, 4].map(id => `[Title ${id}](https://example.com/${id})`));
  });

  it('projects the display columns', () => {
    const [first] = formatTable([article(9, 'fire', 'Hillview', '2024-01-04T18:30:00Z', { source: 'Post', url: '' })]);
    expect(first).toEqual({
      date: '2024-01-04',
      titleLink: 'Title 9',
      locationUnit: 'Hillview',
      category: 'fire',
      source: 'Post',
    });
  });

  it('shows a null date for undated rows', () => {
    expect(formatTable([article(1, 'fire', 'Y', null)])[0]?.date).toBeNull();
  });

  it('does not reorder its input', () => {
    const rows = newsRows();
    formatTable(rows);
    expect(rows.map(r => r.id)).toEqual([0, 1, 2, 3, 4, 5, 6]);
  });
});
