import type { PersonalSubcategory, RetrievalResult } from "../domain/types.js";
import { GIBBERISH, PERSONAL_PREFIX, RECRUITMENT, UNCLEAR_QUESTION } from "../domain/types.js";
import { truncateText } from "../utils/text.js";

export type AnswerLanguage = "id" | "en";

const INDONESIAN_MARKERS =
  /\b(?:apa|siapa|bagaimana|gimana|kenapa|mengapa|kamu|anda|tentang|ceritakan|yang|dan|dong|sih|aja|bisa|punya|pernah)\b/i;

export function detectLanguage(question: string): AnswerLanguage {
  return INDONESIAN_MARKERS.test(question) ? "id" : "en";
}

const PRIVACY_ANSWERS: Record<PersonalSubcategory, Record<AnswerLanguage, string>> = {
  relationship: {
    id: "Soal hubungan pribadi saya simpan sendiri ya. Kalau mau, tanya saja tentang proyek atau keahlian saya.",
    en: "I keep my relationships private. Feel free to ask about my projects or skills instead.",
  },
  financial: {
    id: "Informasi keuangan pribadi tidak saya bagikan di sini. Saya senang bercerita tentang pengalaman dan proyek saya.",
    en: "I don't share personal financial details here. Happy to talk about my experience and projects.",
  },
  contact: {
    id: "Detail kontak pribadi tidak saya tampilkan. Silakan gunakan kanal kontak resmi di halaman portfolio.",
    en: "I don't share personal contact details here. Please use the contact channel on the portfolio page.",
  },
  age: {
    id: "Usia bukan hal yang saya bagikan di sini, tapi saya bisa cerita tentang perjalanan belajar saya.",
    en: "I'd rather not share my age, but I can tell you about my learning journey.",
  },
  family: {
    id: "Urusan keluarga saya jaga tetap privat. Ada yang ingin ditanyakan tentang kuliah atau proyek saya?",
    en: "I keep family matters private. Anything you'd like to know about my studies or projects?",
  },
  religion: {
    id: "Keyakinan pribadi tidak saya bahas di sini. Mari ngobrol tentang hal teknis atau hobi saya.",
    en: "I don't discuss personal beliefs here. Let's talk about tech or my hobbies.",
  },
  health: {
    id: "Informasi kesehatan bersifat pribadi. Saya bisa cerita tentang keseharian dan tools yang saya pakai.",
    en: "Health information stays private. I can tell you about my daily routine and tools instead.",
  },
  appearance: {
    id: "Penampilan bukan topik di portfolio ini. Lebih seru bahas proyek yang pernah saya buat!",
    en: "Appearance isn't part of this portfolio. The projects I've built are more interesting!",
  },
};

const FIXED_ANSWERS: Record<string, Record<AnswerLanguage, string>> = {
  [GIBBERISH]: {
    id: "Maaf, saya belum menangkap maksudnya. Coba tanyakan tentang keahlian, proyek, atau hobi saya.",
    en: "Sorry, I couldn't make sense of that. Try asking about my skills, projects or hobbies.",
  },
  [UNCLEAR_QUESTION]: {
    id: "Bisa diperjelas pertanyaannya? Misalnya: \"proyek apa yang pernah kamu buat?\"",
    en: "Could you be a bit more specific? For example: \"what projects have you built?\"",
  },
  sapaan: {
    id: "Halo! Senang bertemu. Silakan tanya apa saja tentang keahlian, proyek, atau pengalaman saya.",
    en: "Hi there! Ask me anything about my skills, projects or experience.",
  },
};

const NO_CONTEXT_ANSWER: Record<AnswerLanguage, string> = {
  id: "Saya belum punya informasi tentang itu di portfolio ini. Coba tanyakan topik lain yang terkait.",
  en: "I don't have information about that in this portfolio yet. Try one of the related topics.",
};

const LEAD_IN: Record<AnswerLanguage, string> = {
  id: "Berikut yang bisa saya ceritakan:",
  en: "Here is what I can share:",
};

const RECRUITMENT_LEAD_IN: Record<AnswerLanguage, string> = {
  id: "Singkatnya, ini yang bisa saya bawa ke tim:",
  en: "In short, this is what I would bring to the team:",
};

function isPersonalSubcategory(value: string): value is PersonalSubcategory {
  return value in PRIVACY_ANSWERS;
}

/** Answer for categories that never reach retrieval; null for the rest. */
export function buildFixedAnswer(category: string, language: AnswerLanguage): string | null {
  if (category.startsWith(PERSONAL_PREFIX)) {
    const subcategory = category.slice(PERSONAL_PREFIX.length);
    return isPersonalSubcategory(subcategory) ? PRIVACY_ANSWERS[subcategory][language] : null;
  }
  return FIXED_ANSWERS[category]?.[language] ?? null;
}

export function bypassesRetrieval(category: string): boolean {
  return category.startsWith(PERSONAL_PREFIX) || category in FIXED_ANSWERS;
}

/**
 * Answer assembled from the retrieved documents when no language model is
 * configured or it came back empty.
 */
export function buildTemplatedAnswer(
  category: string,
  results: readonly RetrievalResult[],
  language: AnswerLanguage,
  visibilityThreshold: number,
): string {
  const visible = results.filter((result) => result.similarity > visibilityThreshold).slice(0, 2);
  if (visible.length === 0) {
    return NO_CONTEXT_ANSWER[language];
  }

  const leadIn = category === RECRUITMENT ? RECRUITMENT_LEAD_IN[language] : LEAD_IN[language];
  const lines = visible.map(
    (result) => `- ${result.document.title}: ${truncateText(result.document.content, 220)}`,
  );
  return [leadIn, ...lines].join("\n");
}
