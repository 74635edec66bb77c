export interface Link {
  href: string;
  rel: string;
  type?: string;
  title?: string;
  // set on links that must be followed with a request body (STAC search by POST)
  method?: 'GET' | 'POST';
  body?: { [key: string]: unknown };
}
