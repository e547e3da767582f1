/**
 * Cursor Pagination
 *
 * List endpoints answer with at most one page of results and a `Link` header
 * pointing at the neighbouring pages:
 *
 *   <https://sentry.io/api/0/projects/?&cursor=0:0:1>; rel="previous"; results="false"; cursor="0:0:1",
 *   <https://sentry.io/api/0/projects/?&cursor=0:100:0>; rel="next"; results="true"; cursor="0:100:0"
 *
 * `results="false"` on the next link marks the last page.
 */

export interface LinkEntry {
  url: string
  rel: string
  results: boolean
  cursor?: string
}

const ENTRY_PATTERN = /<([^>]*)>((?:\s*;\s*[a-zA-Z]+="[^"]*")*)/g
const PARAM_PATTERN = /;\s*([a-zA-Z]+)="([^"]*)"/g

/**
 * Parse a `Link` header into its entries
 *
 * @example
 * parseLinkHeader('<https://x/?cursor=0:100:0>; rel="next"; results="true"; cursor="0:100:0"')
 * // => [{ url: 'https://x/?cursor=0:100:0', rel: 'next', results: true, cursor: '0:100:0' }]
 */
export function parseLinkHeader(header: string | null | undefined): LinkEntry[] {
  if (!header) return []

  const entries: LinkEntry[] = []
  for (const match of header.matchAll(ENTRY_PATTERN)) {
    const params = new Map<string, string>()
    for (const param of match[2].matchAll(PARAM_PATTERN)) {
      params.set(param[1].toLowerCase(), param[2])
    }

    const rel = params.get('rel')
    if (!rel) continue

    entries.push({
      url: match[1],
      rel,
      results: params.get('results') === 'true',
      cursor: params.get('cursor'),
    })
  }

  return entries
}

/**
 * Cursor for the following page, or null when the current page is the last one
 */
export function nextCursor(header: string | null | undefined): string | null {
  const next = parseLinkHeader(header).find((entry) => entry.rel === 'next')
  if (!next || !next.results || !next.cursor) return null
  return next.cursor
}
