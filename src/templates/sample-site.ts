import { readFile } from 'fs/promises';

// Resolves to <root>/assets from both src/templates and dist/templates
const SAMPLE_PAGE_URL = new URL('../../assets/sample-index.html', import.meta.url);

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;'
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

/**
 * Landing page published when a deploy is given no website directory
 */
export async function renderSampleSite(domainName: string): Promise<string> {
  const template = await readFile(SAMPLE_PAGE_URL, 'utf-8');
  return template.replace(/\{\{domain\}\}/g, escapeHtml(domainName));
}
