/**
 * Paging helpers shared by read-side repositories.
 */

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export interface PageRequest {
	/** 0-indexed */
	readonly page: number;
	readonly pageSize: number;
}

export interface PagedResult<T> {
	readonly items: T[];
	readonly page: number;
	readonly pageSize: number;
	readonly totalItems: number;
	readonly totalPages: number;
	readonly hasNext: boolean;
	readonly hasPrevious: boolean;
}

/**
 * Clamp caller-supplied paging into range.
 */
export function pageRequest(page?: number, pageSize?: number): PageRequest {
	const safePage = page !== undefined && Number.isInteger(page) && page > 0 ? page : 0;
	const safeSize =
		pageSize !== undefined && Number.isInteger(pageSize) && pageSize > 0
			? Math.min(pageSize, MAX_PAGE_SIZE)
			: DEFAULT_PAGE_SIZE;
	return { page: safePage, pageSize: safeSize };
}

export function createPagedResult<T>(items: T[], page: number, pageSize: number, totalItems: number): PagedResult<T> {
	const totalPages = Math.ceil(totalItems / pageSize);
	return {
		items,
		page,
		pageSize,
		totalItems,
		totalPages,
		hasNext: page < totalPages - 1,
		hasPrevious: page > 0,
	};
}
