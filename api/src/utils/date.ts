const publishDateFormat = new Intl.DateTimeFormat('en-US', {
  month: 'long',
  day: '2-digit',
  year: 'numeric',
});

/**
 * Format a post's publish date, e.g. "April 05, 2024"
 */
export function formatPublishDate(date: Date): string {
  return publishDateFormat.format(date);
}
