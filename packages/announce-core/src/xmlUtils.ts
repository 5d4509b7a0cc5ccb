// עזרי XML קלים עבור מעטפות הבקרה. אין כאן פרסר מלא בכוונה: רק ארבע הישויות.

const ESCAPES: ReadonlyArray<[string, string]> = [
  ['&', '&amp;'],
  ['<', '&lt;'],
  ['>', '&gt;'],
  ['"', '&quot;'],
];

/**
 * @hebrew מבצע escape לארבעת התווים & < > " בלבד.
 */
export function escapeXml(value: string): string {
  let result = value;
  for (const [char, entity] of ESCAPES) {
    result = result.split(char).join(entity);
  }
  return result;
}

/**
 * @hebrew הפעולה ההפוכה ל-escapeXml. &amp; מפוענח אחרון, כך ש-"&amp;lt;" חוזר ל-"&lt;".
 */
export function unescapeXml(value: string): string {
  let result = value;
  for (const [char, entity] of [...ESCAPES].reverse()) {
    result = result.split(entity).join(char);
  }
  return result;
}

/**
 * @hebrew מחלץ את התוכן של התגית הראשונה `<tag>...</tag>` בגוף הטקסט ומבצע לו unescape.
 * @returns הערך, או undefined אם התגית לא נמצאה או לא נסגרה.
 */
export function extractTagValue(body: string, tag: string): string | undefined {
  const openTag = `<${tag}>`;
  const start = body.indexOf(openTag);
  if (start < 0) {
    return undefined;
  }
  const valueStart = start + openTag.length;
  const end = body.indexOf(`</${tag}>`, valueStart);
  if (end < 0) {
    return undefined;
  }
  return unescapeXml(body.substring(valueStart, end));
}
