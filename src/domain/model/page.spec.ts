import { paginate } from './page';

describe('paginate', () => {
  const items = ['a', 'b', 'c', 'd', 'e'];

  it('should slice the requested page and reports totals', () => {
    expect(paginate(items, { page: 1, size: 2 })).toEqual({
      content: ['c', 'd'],
      page: 1,
      size: 2,
      totalElements: 5,
      totalPages: 3,
      last: false,
    });
  });

  it('should mark the final page as last', () => {
    expect(paginate(items, { page: 2, size: 2 })).toMatchObject({
      content: ['e'],
      last: true,
    });
  });

  it('should return an empty last page when there is nothing to list', () => {
    expect(paginate([], { page: 0, size: 10 })).toEqual({
      content: [],
      page: 0,
      size: 10,
      totalElements: 0,
      totalPages: 0,
      last: true,
    });
  });
});
