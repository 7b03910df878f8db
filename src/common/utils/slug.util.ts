import { v4 as uuidv4 } from 'uuid';

const MAX_BASE_LENGTH = 50;

export function slugifyTitle(title: string): string {
  const base = title
    .toLowerCase()
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, MAX_BASE_LENGTH)
    .replace(/-+$/g, '');
  return base || 'event';
}

/** `My Amazing Event` -> `my-amazing-event-3f9a1c2b` */
export function generateEventSlug(title: string): string {
  const suffix = uuidv4().replace(/-/g, '').slice(0, 8);
  return `${slugifyTitle(title)}-${suffix}`;
}
