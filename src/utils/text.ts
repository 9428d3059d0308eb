const WORD_REGEX = /[\p{L}\p{N}]+/gu;

export interface LanguageHint {
  code: "ko" | "ja" | "zh" | "es" | "en";
  label: string;
}

/** Line endings only; offsets into the result are what chunks and citations refer to. */
export function normalizeText(text: string): string {
  return text.replace(/\r\n?/g, "\n");
}

export function tokenize(text: string): string[] {
  const words = text.toLowerCase().match(WORD_REGEX) ?? [];
  return [...new Set(words.filter((word) => word.length >= 2 || /[^\x00-\x7f]/.test(word)))];
}

export function scoreByTokenOverlap(query: string, target: string): number {
  const queryTokens = new Set(tokenize(query));
  if (queryTokens.size === 0) {
    return 0;
  }

  const targetTokens = new Set(tokenize(target));
  if (targetTokens.size === 0) {
    return 0;
  }

  let overlap = 0;
  for (const token of queryTokens) {
    if (targetTokens.has(token)) {
      overlap += 1;
    }
  }

  return overlap / Math.sqrt(queryTokens.size * targetTokens.size);
}

export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?。？！])\s+|\n+/u)
    .map((sentence) => sentence.replace(/\s+/g, " ").trim())
    .filter((sentence) => sentence.length > 0);
}

export function truncate(text: string, maxChars: number): string {
  const normalized = text.replace(/\s+/g, " ").trim();
  if (normalized.length <= maxChars) {
    return normalized;
  }
  return `${normalized.slice(0, Math.max(0, maxChars - 3))}...`;
}

export function detectLanguage(question: string): LanguageHint {
  if (/[ㄱ-ㆎ가-힣]/.test(question)) {
    return { code: "ko", label: "Korean" };
  }
  if (/[぀-ゟ゠-ヿ]/.test(question)) {
    return { code: "ja", label: "Japanese" };
  }
  if (/[一-鿿]/.test(question)) {
    return { code: "zh", label: "Chinese" };
  }
  if (/[¿¡áéíóúñü]/i.test(question)) {
    return { code: "es", label: "Spanish" };
  }
  return { code: "en", label: "English" };
}

const NOT_FOUND_MESSAGES: Record<LanguageHint["code"], string> = {
  en: "The answer was not found in the document.",
  es: "La respuesta no se encontró en el documento.",
  ko: "문서에서 답을 찾지 못했습니다.",
  ja: "文書内に回答が見つかりませんでした。",
  zh: "文档中未找到答案。",
};

const NO_DOCUMENT_MESSAGES: Record<LanguageHint["code"], string> = {
  en: "No document has been ingested for this collection yet.",
  es: "Todavía no se ha cargado ningún documento en esta colección.",
  ko: "이 컬렉션에는 아직 문서가 없습니다.",
  ja: "このコレクションにはまだ文書がありません。",
  zh: "该集合尚未导入任何文档。",
};

export function notFoundMessage(language: LanguageHint): string {
  return NOT_FOUND_MESSAGES[language.code];
}

export function noDocumentMessage(language: LanguageHint): string {
  return NO_DOCUMENT_MESSAGES[language.code];
}
