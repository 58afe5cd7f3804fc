// Post-link extraction and ownership checks. Purely syntactic: no network lookups.

export const DOMAIN_ALIASES = ["twitter.com", "x.com"] as const;

export const RESERVED_PATHS: ReadonlySet<string> = new Set([
  "home",
  "search",
  "notifications",
  "messages",
  "i",
  "explore",
  "settings"
]);

export const DEFAULT_LINK_LIMIT = 30;

const HANDLE_RE = /^[A-Za-z0-9_]{1,15}$/;
const TRAILING_PUNCTUATION_RE = /[.,;!?)]+$/;

function domainPattern(): string {
  return DOMAIN_ALIASES.map((d) => d.replace(/\./g, "\\.")).join("|");
}

// Fresh instance per call: a shared /g regex would carry lastIndex between callers.
function candidateRegex(): RegExp {
  return new RegExp(`https?://(?:www\\.|mobile\\.|m\\.)?(?:${domainPattern()})/[^\\s<>"'\`]+`, "gi");
}

const LINK_HEAD_RE = new RegExp(`^https?://(?:www\\.|mobile\\.|m\\.)?(?:${domainPattern()})/([^/?#\\s]+)`, "i");
// The status segment must follow the handle in the path, not sit in a query string or fragment.
const POST_ID_RE = new RegExp(`^https?://(?:www\\.|mobile\\.|m\\.)?(?:${domainPattern()})/[^/?#\\s]+/status/(\\d+)(?:[/?#]|$)`, "i");

export function cleanLink(raw: string): string {
  return raw.replace(TRAILING_PUNCTUATION_RE, "");
}

export function extractLinks(text: string, opts: { limit?: number } = {}): string[] {
  const limit = opts.limit ?? DEFAULT_LINK_LIMIT;
  if (!text || limit <= 0) return [];
  const seen = new Set<string>();
  const out: string[] = [];
  for (const m of text.matchAll(candidateRegex())) {
    const cleaned = cleanLink(m[0]);
    if (seen.has(cleaned)) continue;
    seen.add(cleaned);
    out.push(cleaned);
    if (out.length >= limit) break;
  }
  return out;
}

export function extractPostId(link: string): string | null {
  const m = link.match(POST_ID_RE);
  return m?.[1] ?? null;
}

// First path segment after the domain, lowercased; null for reserved paths.
export function extractHandle(link: string): string | null {
  const m = link.match(LINK_HEAD_RE);
  const segment = m?.[1]?.toLowerCase();
  if (!segment || RESERVED_PATHS.has(segment)) return null;
  return segment;
}

export function parsePostLink(link: string): { handle: string; post_id: string } | null {
  const handle = extractHandle(link);
  if (!handle) return null;
  const post_id = extractPostId(link);
  if (!post_id) return null;
  return { handle, post_id };
}

export function validateLink(link: string, claimedHandle: string): boolean {
  const parsed = parsePostLink(link);
  if (!parsed) return false;
  return parsed.handle === claimedHandle.trim().replace(/^@/, "").toLowerCase();
}

export function normalizeHandle(input: string): string | null {
  const s = input.trim().replace(/^@/, "");
  return HANDLE_RE.test(s) ? s : null;
}
