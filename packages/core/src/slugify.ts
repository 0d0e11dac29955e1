/**
 * Lowercase, hyphen-separated slug safe for file names.
 * "John D. O'Connor" -> "john-d-o-connor"
 */
export function slugify(value: string): string {
  return value
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Hands out slugs that are unique within one run: a repeated base gets
 * "-2", "-3", ... appended.
 */
export class SlugRegistry {
  private readonly used = new Set<string>();

  claim(value: string, fallback = 'prospect'): string {
    const base = slugify(value) || fallback;
    let slug = base;
    for (let n = 2; this.used.has(slug); n++) slug = `${base}-${n}`;
    this.used.add(slug);
    return slug;
  }
}
