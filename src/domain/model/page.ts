export interface PageRequest {
  /** Zero-based page index */
  page: number;
  size: number;
}

export interface Page<T> {
  content: T[];
  page: number;
  size: number;
  totalElements: number;
  totalPages: number;
  last: boolean;
}

export const DEFAULT_PAGE_REQUEST: PageRequest = { page: 0, size: 10 };
export const MAX_PAGE_SIZE = 100;

export function paginate<T>(items: T[], request: PageRequest): Page<T> {
  const totalElements = items.length;
  const totalPages = Math.ceil(totalElements / request.size);
  const offset = request.page * request.size;

  return {
    content: items.slice(offset, offset + request.size),
    page: request.page,
    size: request.size,
    totalElements,
    totalPages,
    last: request.page >= totalPages - 1,
  };
}
