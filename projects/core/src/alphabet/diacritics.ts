/**
 * Hebrew points and cantillation live in U+0591..U+05C7. Four code points in
 * that block are punctuation and survive stripping: maqaf U+05BE, paseq
 * U+05C0, sof pasuq U+05C3 and nun hafukha U+05C6.
 */
const HEBREW_MARK_CLASS = "[\\u0591-\\u05BD\\u05BF\\u05C1\\u05C2\\u05C4\\u05C5\\u05C7]";
const HEBREW_MARK_RE = new RegExp(HEBREW_MARK_CLASS, "gu");
const HEBREW_MARK_TEST_RE = new RegExp(HEBREW_MARK_CLASS, "u");

/** Precomposed letters with points, e.g. U+FB2A SHIN WITH SHIN DOT. */
const PRESENTATION_FORM_RE = /[\uFB1D-\uFB4E]/gu;

function decomposePresentationForms(text: string): string {
  return text.replace(PRESENTATION_FORM_RE, (ch) => ch.normalize("NFD"));
}

/**
 * Removes niqqud, dagesh, shin/sin dots and cantillation marks.
 * Idempotent: stripping a stripped text returns it unchanged.
 */
export function stripDiacritics(text: string): string {
  return decomposePresentationForms(text).replace(HEBREW_MARK_RE, "");
}

export function hasDiacritics(text: string): boolean {
  return HEBREW_MARK_TEST_RE.test(decomposePresentationForms(text));
}

export function isHebrewMark(ch: string): boolean {
  return HEBREW_MARK_TEST_RE.test(ch);
}
