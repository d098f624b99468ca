export const normalizeWhitespace = (text: string): string => text.replace(/\s+/g, ' ').trim();

export const stripTags = (html: string): string => {
  const withoutScripts = html.replace(/<script[\s\S]*?<\/script>/gi, ' ');
  const withoutStyles = withoutScripts.replace(/<style[\s\S]*?<\/style>/gi, ' ');
  return withoutStyles.replace(/<[^>]+>/g, ' ');
};

const fromCodePoint = (code: number): string =>
  Number.isInteger(code) && code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : '';

export const decodeEntities = (text: string): string =>
  text
    .replace(/&nbsp;/g, ' ')
    .replace(/&quot;/g, '"')
    .replace(/&#39;|&apos;/g, "'")
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&#(\d+);/g, (_match, num: string) => fromCodePoint(Number(num)))
    .replace(/&#x([0-9a-f]+);/gi, (_match, hex: string) => fromCodePoint(Number.parseInt(hex, 16)))
    // last, so that "&amp;lt;" stays "&lt;"
    .replace(/&amp;/g, '&');

/** Text of every `<p>` element, in document order, one entry per non-empty paragraph. */
export const extractParagraphs = (html: string): string[] => {
  const withoutScripts = html.replace(/<script[\s\S]*?<\/script>/gi, ' ').replace(/<style[\s\S]*?<\/style>/gi, ' ');
  const paragraphs: string[] = [];
  const re = /<p(?:\s[^>]*)?>([\s\S]*?)<\/p\s*>/gi;
  let match: RegExpExecArray | null;
  while ((match = re.exec(withoutScripts)) !== null) {
    const text = normalizeWhitespace(decodeEntities(stripTags(match[1] ?? '')));
    if (text) {
      paragraphs.push(text);
    }
  }
  return paragraphs;
};

export const splitWords = (text: string): string[] => text.split(/\s+/).filter(Boolean);
