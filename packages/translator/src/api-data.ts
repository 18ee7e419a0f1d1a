import { z } from 'zod';

/** Result of translating one text. */
export type TextResult = {
  text: string;
  detectedSourceLang: string;
  billedCharacters?: number;
};

/** Result of rephrasing one text. */
export type WriteResult = {
  text: string;
  detectedSourceLanguage: string;
  targetLanguage: string;
};

/**
 * Identifies one document translation job. Both fields are opaque strings
 * issued by the upload endpoint; a handle can be stored and rebuilt with
 * `fromJSON` to resume a job in another process.
 */
export class DocumentHandle {
  readonly documentId: string;
  readonly documentKey: string;

  constructor(documentId: string, documentKey: string) {
    this.documentId = documentId;
    this.documentKey = documentKey;
    Object.freeze(this);
  }

  static fromJSON(value: unknown): DocumentHandle {
    const parsed = documentHandleSchema.parse(value);
    return new DocumentHandle(parsed.documentId, parsed.documentKey);
  }

  toJSON(): { documentId: string; documentKey: string } {
    return { documentId: this.documentId, documentKey: this.documentKey };
  }

  toString(): string {
    return `Document ID: ${this.documentId}, key: ${this.documentKey}`;
  }
}

const documentHandleSchema = z.object({
  documentId: z.string().min(1),
  documentKey: z.string().min(1),
});

const documentStatusValues = ['queued', 'translating', 'done', 'downloaded', 'error'] as const;
export type DocumentStatusValue = (typeof documentStatusValues)[number];

type DocumentStatusInit = {
  status: DocumentStatusValue;
  secondsRemaining?: number;
  billedCharacters?: number;
  errorMessage?: string;
};

/** Status of a document translation job, as reported by one status poll. */
export class DocumentStatus {
  readonly status: DocumentStatusValue;
  readonly secondsRemaining: number | undefined;
  readonly billedCharacters: number | undefined;
  readonly errorMessage: string | undefined;

  constructor(init: DocumentStatusInit) {
    this.status = init.status;
    this.secondsRemaining = init.secondsRemaining;
    this.billedCharacters = init.billedCharacters;
    this.errorMessage = init.errorMessage;
    Object.freeze(this);
  }

  get ok(): boolean {
    return this.status !== 'error';
  }

  get done(): boolean {
    return this.status === 'done';
  }

  toJSON(): DocumentStatusInit {
    return {
      status: this.status,
      ...(this.secondsRemaining === undefined ? {} : { secondsRemaining: this.secondsRemaining }),
      ...(this.billedCharacters === undefined ? {} : { billedCharacters: this.billedCharacters }),
      ...(this.errorMessage === undefined ? {} : { errorMessage: this.errorMessage }),
    };
  }

  toString(): string {
    return this.status;
  }
}

export type Language = {
  code: string;
  name: string;
  supportsFormality?: boolean;
};

export type GlossaryLanguagePair = {
  sourceLang: string;
  targetLang: string;
};

export type GlossaryInfo = {
  glossaryId: string;
  name: string;
  ready: boolean;
  sourceLang: string;
  targetLang: string;
  creationTime: Date;
  entryCount: number;
};

/** Removes the regional variant from a language code, e.g. EN-US gives EN. */
export function removeRegionalVariant(language: string): string {
  return language.toUpperCase().slice(0, 2);
}

export function describeGlossary(glossary: GlossaryInfo): string {
  return `Glossary "${glossary.name}" (${glossary.glossaryId})`;
}

export type UsageDetail = {
  count: number | undefined;
  limit: number | undefined;
  valid: boolean;
  limitReached: boolean;
};

export type Usage = {
  character: UsageDetail;
  document: UsageDetail;
  teamDocument: UsageDetail;
  anyLimitReached: boolean;
};

export function describeUsageDetail(detail: UsageDetail): string {
  return detail.valid ? `${detail.count} of ${detail.limit}` : 'Unknown';
}

export function describeUsage(usage: Usage): string {
  const details: Array<[string, UsageDetail]> = [
    ['Characters', usage.character],
    ['Documents', usage.document],
    ['Team documents', usage.teamDocument],
  ];

  return [
    'Usage this billing period:',
    ...details.filter(([, detail]) => detail.valid).map(([label, detail]) => `${label}: ${describeUsageDetail(detail)}`),
  ].join('\n');
}

export const formalityValues = ['less', 'more', 'default', 'prefer_less', 'prefer_more'] as const;
export type Formality = (typeof formalityValues)[number];

export const splitSentencesValues = ['0', '1', 'nonewlines'] as const;
export type SplitSentences = (typeof splitSentencesValues)[number];

export type ModelType = 'quality_optimized' | 'latency_optimized' | 'prefer_quality_optimized';

export type WritingStyle =
  | 'academic'
  | 'business'
  | 'casual'
  | 'default'
  | 'simple'
  | 'prefer_academic'
  | 'prefer_business'
  | 'prefer_casual'
  | 'prefer_simple';

export type WritingTone =
  | 'confident'
  | 'default'
  | 'diplomatic'
  | 'enthusiastic'
  | 'friendly'
  | 'prefer_confident'
  | 'prefer_diplomatic'
  | 'prefer_enthusiastic'
  | 'prefer_friendly';

// Response payloads

const optionalInt = z
  .unknown()
  .transform((value) => {
    const parsed = typeof value === 'string' ? Number(value) : value;
    return typeof parsed === 'number' && Number.isInteger(parsed) ? parsed : undefined;
  });

export const translateResponseSchema = z.object({
  translations: z
    .array(
      z.object({
        text: z.string(),
        detected_source_language: z.string().default(''),
        billed_characters: optionalInt,
      }),
    )
    .default([]),
});

export const rephraseResponseSchema = z.object({
  improvements: z
    .array(
      z.object({
        text: z.string().default(''),
        detected_source_language: z.string().default(''),
        target_language: z.string().default(''),
      }),
    )
    .default([]),
});

export const documentUploadResponseSchema = z.object({
  document_id: z.string(),
  document_key: z.string(),
});

export const documentStatusResponseSchema = z.object({
  status: z.enum(documentStatusValues),
  seconds_remaining: optionalInt,
  billed_characters: optionalInt,
  error_message: z.string().nullish(),
});

export const languagesResponseSchema = z.array(
  z.object({
    language: z.string(),
    name: z.string(),
    supports_formality: z.boolean().optional(),
  }),
);

export const glossaryLanguagePairsResponseSchema = z.object({
  supported_languages: z
    .array(z.object({ source_lang: z.string(), target_lang: z.string() }))
    .default([]),
});

export const glossaryInfoSchema = z
  .object({
    glossary_id: z.string(),
    name: z.string(),
    ready: z.boolean(),
    source_lang: z.string(),
    target_lang: z.string(),
    creation_time: z.string(),
    entry_count: z.number().int(),
  })
  .transform(
    (json): GlossaryInfo => ({
      glossaryId: json.glossary_id,
      name: json.name,
      ready: json.ready,
      sourceLang: json.source_lang.toUpperCase(),
      targetLang: json.target_lang.toUpperCase(),
      creationTime: new Date(json.creation_time),
      entryCount: json.entry_count,
    }),
  );

export const glossaryListResponseSchema = z.object({
  glossaries: z.array(glossaryInfoSchema).default([]),
});

const usageJsonSchema = z.record(z.string(), z.unknown());

function usageDetail(json: Record<string, unknown>, prefix: string): UsageDetail {
  const count = optionalInt.parse(json[`${prefix}_count`]);
  const limit = optionalInt.parse(json[`${prefix}_limit`]);
  const valid = count !== undefined && limit !== undefined;

  return {
    count,
    limit,
    valid,
    limitReached: count !== undefined && limit !== undefined && count >= limit,
  };
}

export const usageResponseSchema = usageJsonSchema.transform((json): Usage => {
  const character = usageDetail(json, 'character');
  const document = usageDetail(json, 'document');
  const teamDocument = usageDetail(json, 'team_document');

  return {
    character,
    document,
    teamDocument,
    anyLimitReached: character.limitReached || document.limitReached || teamDocument.limitReached,
  };
});
