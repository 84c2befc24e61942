/**
 * Heuristic language detection for customer text.
 * Scores accent characters and common words per language; ties go to the
 * earlier entry in LANGUAGE_MARKERS. Anything unscored is English.
 */

export type LanguageCode = 'en' | 'es' | 'fr' | 'pt' | 'de' | 'it';

interface LanguageMarkers {
  code: Exclude<LanguageCode, 'en'>;
  accents: RegExp;
  words: string[];
}

const LANGUAGE_MARKERS: LanguageMarkers[] = [
  {
    code: 'es',
    accents: /[áéíóúüñ¿¡]/,
    words: ['hola', 'gracias', 'por favor', 'buenos', 'buenas', 'qué', 'cómo', 'dónde', 'cuánto', 'tiene', 'tienen', 'quiero', 'busco', 'necesito'],
  },
  {
    code: 'fr',
    accents: /[àâçéèêëîïôùûü]/,
    words: ['bonjour', 'merci', "s'il vous plaît", 'je voudrais', 'comment', 'où', 'combien', 'avez-vous', 'cherche'],
  },
  {
    code: 'pt',
    accents: /[ãõçáàâéêíóôú]/,
    words: ['olá', 'obrigado', 'obrigada', 'por favor', 'bom dia', 'boa tarde', 'como', 'onde', 'quanto', 'tem', 'tenho', 'quero', 'preciso'],
  },
  {
    code: 'de',
    accents: /[äöüß]/,
    words: ['hallo', 'danke', 'bitte', 'guten', 'wie', 'wo', 'wieviel', 'haben', 'möchte', 'suche', 'brauche'],
  },
  {
    code: 'it',
    accents: /[àèéìíîòóùú]/,
    words: ['ciao', 'grazie', 'per favore', 'buongiorno', 'come', 'dove', 'quanto', 'avete', 'vorrei', 'cerco'],
  },
];

const LANGUAGE_NAMES: Record<LanguageCode, string> = {
  en: 'English',
  es: 'Spanish',
  fr: 'French',
  pt: 'Portuguese',
  de: 'German',
  it: 'Italian',
};

function containsWord(padded: string, word: string): boolean {
  return padded.includes(` ${word} `);
}

export function detectLanguage(text: string | undefined): LanguageCode {
  if (!text) return 'en';

  const lower = text.toLowerCase();
  // Pad and collapse punctuation so multi-word markers match on word boundaries
  const padded = ` ${lower.replace(/[^\p{L}'-]+/gu, ' ')} `;

  let best: LanguageCode = 'en';
  let bestScore = 0;
  for (const markers of LANGUAGE_MARKERS) {
    let score = 0;
    if (markers.accents.test(lower)) score++;
    if (markers.words.some((w) => containsWord(padded, w))) score++;
    if (score > bestScore) {
      best = markers.code;
      bestScore = score;
    }
  }
  return best;
}

export function isSupportedLanguage(code: string): code is LanguageCode {
  return code in LANGUAGE_NAMES;
}

export function languageName(code: string): string {
  return isSupportedLanguage(code) ? LANGUAGE_NAMES[code] : LANGUAGE_NAMES.en;
}
