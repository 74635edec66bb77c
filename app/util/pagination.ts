import { Request, Response } from 'express';
import { ILengthAwarePagination } from 'knex-paginate';
import { Link } from './links';
import { RequestValidationError } from './errors';
import { getRequestUrl } from './url';
import env from './env';

export interface PagingParams {
  page: number;
  limit: number;
}

export interface Pagination {
  currentPage: number;
  perPage: number;
  total: number;
  lastPage: number;
  from: number;
  to: number;
}

/**
 * Converts the pagination returned by knex-paginate, whose fields depend on the
 * paginate options, to a length-aware pagination
 * @param pagination - the pagination as returned by knex-paginate
 * @returns the pagination with its total and last page
 */
export function toPagination(pagination: Partial<ILengthAwarePagination>): Pagination {
  const perPage = pagination.perPage ?? 0;
  const total = pagination.total ?? 0;
  return {
    currentPage: pagination.currentPage ?? 1,
    perPage,
    total,
    lastPage: pagination.lastPage ?? (perPage > 0 ? Math.ceil(total / perPage) : 1),
    from: pagination.from ?? 0,
    to: pagination.to ?? 0,
  };
}

/**
 * Build the RequestValidationError with a custom message that specifies what the validation constraints are.
 * @param min - min constraint for the parameter
 * @param max - max constraint for the parameter
 * @param paramName - name of the parameter being validated
 * @returns RequestValidationError
 */
function buildIntegerParseError(min: number | null, max: number | null, paramName: string): RequestValidationError {
  const constraints = [];
  if (min !== null)
    constraints.push(` greater than or equal to ${min}`);
  if (max !== null)
    constraints.push(` less than or equal to ${max}`);
  return new RequestValidationError(`Parameter "${paramName}" is invalid. Must be an integer${constraints.join(' and')}.`);
}

/**
 * Validates that the given parameter is an integer within bounds, returning the
 * corresponding number if it is or throwing a validation error if it isn't
 * @param params - The query or body parameters possibly containing the parameter
 * @param paramName - The name of the parameter being validated, for error messaging
 * @param defaultValue - the default to return if the parameter is not set
 * @param min - The minimum acceptable value the number
 * @param max - The maximum acceptable value the number
 * @returns The numeric value of the parameter
 * @throws {@link RequestValidationError} If the passed value is not an integer within bounds
 */
export function parseIntegerParam(
  params: { [key: string]: unknown },
  paramName: string,
  defaultValue: number,
  min: number | null = null,
  max: number | null = null,
): number {
  const rawValue = params[paramName];
  if (rawValue === undefined || rawValue === null || rawValue === '') {
    return defaultValue;
  }
  const value = typeof rawValue === 'number' || typeof rawValue === 'string' ? +rawValue : NaN;
  if (Number.isNaN(value)
    || !Number.isSafeInteger(value)
    || (min !== null && value < min)
    || (max !== null && value > max)) {
    throw buildIntegerParseError(min, max, paramName);
  }
  return value;
}

/**
 * Gets the paging parameters from the given query or body parameters
 * @param params - The parameters possibly containing `page` and `limit`
 * @param defaultPageSize - The page size to use if no `limit` parameter is given
 * @returns The paging parameters
 * @throws {@link RequestValidationError} If invalid paging parameters are provided
 */
export function getPagingParams(
  params: { [key: string]: unknown },
  defaultPageSize = env.cubedashDefaultApiLimit,
): PagingParams {
  return {
    page: parseIntegerParam(params, 'page', 1, 1),
    limit: parseIntegerParam(params, 'limit', defaultPageSize, 1, env.cubedashHardApiLimit),
  };
}

/**
 * Returns a link to one page of a paged response
 * @param req - the Express request to generate links relative to
 * @param pagination - pagination info for the current request
 * @param page - the page number for the link
 * @param rel - the name of the link relation
 * @param relName - the name of the link relation
 * @returns the generated link
 */
function getPagingLink(
  req: Request,
  pagination: Pagination,
  page: number,
  rel: string,
  relName: string = rel,
): Link {
  const { lastPage, perPage } = pagination;
  const suffix = (lastPage <= 1 && page === 1) || perPage === 0 ? '' : ` (${page} of ${lastPage})`;
  const link: Link = {
    title: `The ${relName} page${suffix}`,
    href: getRequestUrl(req, true, { page, limit: perPage }),
    rel,
    type: 'application/json',
  };
  if (req.method === 'POST') {
    link.href = getRequestUrl(req, false);
    link.method = 'POST';
    link.body = { ...req.body, page, limit: perPage };
  }
  return link;
}

/**
 * Returns a list of links for paginating a response
 * @param req - the Express request to generate links relative to
 * @param pagination - the pagination information of the response
 * @param rels - the relations to include
 * @returns the links to paginate
 */
export function getPagingLinks(
  req: Request,
  pagination: Pagination,
  rels: string[] = ['first', 'prev', 'self', 'next', 'last'],
): Link[] {
  const result = [];
  const { currentPage, lastPage, perPage } = pagination;
  if (perPage > 0 && currentPage > 2) result.push(getPagingLink(req, pagination, 1, 'first'));
  if (perPage > 0 && currentPage > 1) result.push(getPagingLink(req, pagination, currentPage - 1, 'prev', 'previous'));
  result.push(getPagingLink(req, pagination, currentPage, 'self', 'current'));
  if (perPage > 0 && currentPage < lastPage) result.push(getPagingLink(req, pagination, currentPage + 1, 'next'));
  if (perPage > 0 && currentPage < lastPage - 1) result.push(getPagingLink(req, pagination, lastPage, 'last'));
  return result.filter((link) => rels.includes(link.rel));
}

/**
 * Sets paging headers on the response according to the supplied pagination values
 * @param res - The Express response where paging params should be set
 * @param pagination - Paging information about the request
 */
export function setPagingHeaders(res: Response, pagination: Pagination): void {
  res.set('Explorer-Hits', pagination.total.toString());
}
