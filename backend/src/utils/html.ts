export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

// Appends the optional id attribute and closes a void element in HTML or XHTML style.
export function closeTag(html: string, asXhtml: boolean, id?: string | null): string {
  let out = html;
  if (id) {
    out += ` id="${id}"`;
  }
  return out + (asXhtml ? ' />' : '>');
}
