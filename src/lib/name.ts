const TICKET_ID = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export function isValidTicketId(id: string): boolean {
  return TICKET_ID.test(id) && !id.includes('..');
}

/**
 * Normalize free text into a valid git branch name component.
 *
 * Used to turn ticket titles into the slug of `feature/<id>-<slug>` branches.
 */
export function normalizeName(raw: string, fallback: string): string {
  const name = raw
    .toLowerCase()
    .replace(/[\x00-\x1f\x7f]+/g, '')
    .replace(/[\s_]+/g, '-')
    // Git-invalid chars
    .replace(/[~^:?*[\]\\@{}<>'"`!#$%&()+,;=|]+/g, '-')
    .replace(/\.{2,}/g, '.')
    .replace(/-{2,}/g, '-')
    .split('/')
    .map(normalizeSegment)
    .filter(Boolean)
    .join('/');

  return name || fallback;
}

function normalizeSegment(segment: string): string {
  let s = segment;
  while (s.endsWith('.lock')) {
    s = s.slice(0, -5);
  }
  return s.replace(/^[-.]+|[-.]+$/g, '');
}

/** `IN-413` + `Public API bulk uploads` → `feature/IN-413-public-api-bulk-uploads` */
export function ticketBranchName(ticketId: string, title?: string): string {
  const slug = title ? normalizeName(title.replace(/\//g, ' '), '') : '';
  return slug ? `feature/${ticketId}-${slug}` : `feature/${ticketId}`;
}

/** tmux treats `.` and `:` as target separators. */
export function sanitizeTmuxName(name: string): string {
  return name.replace(/[.:]/g, '-');
}

export function ticketSessionName(prefix: string, ticketId: string): string {
  return sanitizeTmuxName(`${prefix}${ticketId}`);
}
