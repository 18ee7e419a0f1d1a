import { createReadStream, createWriteStream, ReadStream } from 'node:fs';
import { rm } from 'node:fs/promises';
import os from 'node:os';
import { basename } from 'node:path';
import type { Readable, Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { createLogger } from '@workspace/logger';
import type { z } from 'zod';
import {
  DocumentHandle,
  DocumentStatus,
  documentStatusResponseSchema,
  documentUploadResponseSchema,
  glossaryInfoSchema,
  glossaryLanguagePairsResponseSchema,
  glossaryListResponseSchema,
  languagesResponseSchema,
  removeRegionalVariant,
  rephraseResponseSchema,
  translateResponseSchema,
  usageResponseSchema,
} from './api-data.js';
import type {
  Formality,
  GlossaryInfo,
  GlossaryLanguagePair,
  Language,
  ModelType,
  SplitSentences,
  TextResult,
  Usage,
  WriteResult,
  WritingStyle,
  WritingTone,
} from './api-data.js';
import { resolveClientConfig } from './config.js';
import type { ClientConfig, ClientConfigInput } from './config.js';
import { DocumentPoller } from './document/document-poller.js';
import { ApiError, DocumentTranslationError } from './errors.js';
import { AxiosTransport } from './http/axios-transport.js';
import { FetchTransport } from './http/fetch-transport.js';
import { createRequest } from './http/request.js';
import { RequestExecutor } from './http/request-executor.js';
import type { Sleep } from './http/request-executor.js';
import { raiseForStatus } from './http/response-interpreter.js';
import type { InterpretContext } from './http/response-interpreter.js';
import { readBytes } from './http/streams.js';
import type { ChunkCallback, HttpMethod, HttpResponse, RequestBody, Transport } from './http/types.js';
import { convertDictToTsv, convertTsvToDict } from './glossary/entries.js';
import type { GlossaryEntries } from './glossary/entries.js';
import { RequestMetrics } from './observability/request-metrics.js';

const translatorLog = createLogger('Translator');

const LIBRARY_NAME = 'translator-client';
const LIBRARY_VERSION = '0.1.0';

const SERVER_URL = 'https://api.deepl.com';
const SERVER_URL_FREE = 'https://api-free.deepl.com';

type TransportChoice = 'axios' | 'fetch' | Transport;

type AppInfo = {
  name: string;
  version: string;
};

type TranslatorOptions = ClientConfigInput & {
  serverUrl?: string;
  transport?: TransportChoice;
  sleep?: Sleep;
  metrics?: RequestMetrics;
  appInfo?: AppInfo;
};

type TranslateTextOptions = {
  targetLang: string;
  sourceLang?: string;
  context?: string;
  splitSentences?: SplitSentences;
  preserveFormatting?: boolean;
  formality?: Formality;
  glossary?: string | GlossaryInfo;
  tagHandling?: 'xml' | 'html';
  outlineDetection?: boolean;
  nonSplittingTags?: readonly string[];
  splittingTags?: readonly string[];
  ignoreTags?: readonly string[];
  modelType?: ModelType;
};

type RephraseTextOptions = {
  targetLang?: string;
  style?: WritingStyle;
  tone?: WritingTone;
};

type DocumentInput = Buffer | string | Readable;

type DocumentTranslateOptions = {
  targetLang: string;
  sourceLang?: string;
  formality?: Formality;
  glossary?: string | GlossaryInfo;
  /** Required for Buffer and string input; used to detect the file type */
  filename?: string;
  outputFormat?: string;
  /** Overall limit for waiting on the translation */
  timeoutMs?: number;
};

type ApiRequestOptions = {
  method?: HttpMethod;
  body?: RequestBody;
  headers?: Record<string, string>;
  stream?: boolean;
  onChunk?: ChunkCallback;
};

export function isFreeAccountAuthKey(authKey: string): boolean {
  return authKey.endsWith(':fx');
}

export function buildUserAgent(
  config: Pick<ClientConfig, 'userAgent' | 'sendPlatformInfo'>,
  transportName: string,
  appInfo?: AppInfo,
): string {
  const parts = [config.userAgent ?? `${LIBRARY_NAME}/${LIBRARY_VERSION}`];

  if (config.userAgent === undefined && config.sendPlatformInfo) {
    parts.push(`(${os.type()} ${os.release()})`, `node/${process.versions.node}`, transportName);
  }

  if (appInfo) {
    parts.push(`${appInfo.name}/${appInfo.version}`);
  }

  return parts.join(' ');
}

function createTransport(choice: TransportChoice, config: ClientConfig): Transport {
  if (choice === 'axios') {
    return new AxiosTransport({ proxyUrl: config.proxyUrl });
  }

  if (config.proxyUrl !== undefined) {
    throw new Error('proxyUrl is only supported by the axios transport');
  }

  return choice === 'fetch' ? new FetchTransport() : choice;
}

function glossaryIdOf(glossary: string | GlossaryInfo): string {
  return typeof glossary === 'string' ? glossary : glossary.glossaryId;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function writeChunk(sink: Writable, chunk: Uint8Array): Promise<void> {
  return new Promise((resolve, reject) => {
    sink.write(chunk, (error) => (error ? reject(error) : resolve()));
  });
}

/**
 * Checks the language options shared by text and document translation and
 * returns them as request parameters.
 */
function languageParams(
  options: Pick<TranslateTextOptions, 'targetLang' | 'sourceLang' | 'formality' | 'glossary'>,
): Record<string, string> {
  const targetLang = options.targetLang.toUpperCase();
  const sourceLang = options.sourceLang?.toUpperCase();

  if (targetLang === 'EN') {
    throw new Error('targetLang="EN" is deprecated, please use "EN-GB" or "EN-US" instead.');
  }
  if (targetLang === 'PT') {
    throw new Error('targetLang="PT" is deprecated, please use "PT-PT" or "PT-BR" instead.');
  }

  const params: Record<string, string> = { target_lang: targetLang };

  if (sourceLang !== undefined) {
    params.source_lang = sourceLang;
  }

  if (options.formality !== undefined) {
    params.formality = options.formality;
  }

  if (options.glossary !== undefined) {
    if (sourceLang === undefined) {
      throw new Error('sourceLang is required if using a glossary');
    }

    if (
      typeof options.glossary !== 'string' &&
      (removeRegionalVariant(targetLang) !== options.glossary.targetLang ||
        removeRegionalVariant(sourceLang) !== options.glossary.sourceLang)
    ) {
      throw new Error('sourceLang and targetLang must match glossary');
    }

    params.glossary_id = glossaryIdOf(options.glossary);
  }

  return params;
}

/**
 * Client of the translation API. Every call goes through the retrying
 * request executor; error statuses are turned into typed errors.
 */
export class Translator {
  private readonly authKey: string;
  private readonly config: ClientConfig;
  private readonly baseUrl: string;
  private readonly transport: Transport;
  private readonly executor: RequestExecutor<unknown>;
  private readonly poller: DocumentPoller;
  private readonly requestMetrics: RequestMetrics;
  private userAgent: string;

  constructor(authKey: string, options: TranslatorOptions = {}) {
    if (!authKey) {
      throw new Error('authKey must be a non-empty string');
    }

    const { serverUrl, transport, sleep, metrics, appInfo, ...configInput } = options;
    this.authKey = authKey;
    this.config = resolveClientConfig(configInput);
    this.baseUrl = serverUrl ?? (isFreeAccountAuthKey(authKey) ? SERVER_URL_FREE : SERVER_URL);
    this.transport = createTransport(transport ?? 'axios', this.config);
    this.requestMetrics = metrics ?? new RequestMetrics();
    this.executor = new RequestExecutor<unknown>(this.transport, {
      config: this.config,
      sleep,
      metrics: this.requestMetrics,
    });
    this.poller = new DocumentPoller((handle) => this.translateDocumentGetStatus(handle), {
      intervalMs: this.config.pollIntervalMs,
      sleep,
    });
    this.userAgent = buildUserAgent(this.config, this.transport.name, appInfo);
  }

  get serverUrl(): string {
    return this.baseUrl;
  }

  get metrics(): RequestMetrics {
    return this.requestMetrics;
  }

  /** Appends the calling application's name and version to the User-Agent header. */
  setAppInfo(name: string, version: string): this {
    this.userAgent = buildUserAgent(this.config, this.transport.name, { name, version });
    return this;
  }

  translateText(text: string, options: TranslateTextOptions): Promise<TextResult>;
  translateText(text: readonly string[], options: TranslateTextOptions): Promise<TextResult[]>;
  async translateText(
    text: string | readonly string[],
    options: TranslateTextOptions,
  ): Promise<TextResult | TextResult[]> {
    const texts = typeof text === 'string' ? [text] : [...text];
    if (texts.length === 0 || texts.some((item) => item.length === 0)) {
      throw new Error('text must not be empty');
    }

    const json: Record<string, unknown> = { text: texts, ...languageParams(options) };
    if (options.context !== undefined) json.context = options.context;
    if (options.splitSentences !== undefined) json.split_sentences = options.splitSentences;
    if (options.preserveFormatting !== undefined) json.preserve_formatting = options.preserveFormatting;
    if (options.tagHandling !== undefined) json.tag_handling = options.tagHandling;
    if (options.outlineDetection !== undefined) json.outline_detection = options.outlineDetection;
    if (options.nonSplittingTags !== undefined) json.non_splitting_tags = [...options.nonSplittingTags];
    if (options.splittingTags !== undefined) json.splitting_tags = [...options.splittingTags];
    if (options.ignoreTags !== undefined) json.ignore_tags = [...options.ignoreTags];
    if (options.modelType !== undefined) json.model_type = options.modelType;

    const response = await this.request('v2/translate', { body: { kind: 'json', json } });
    const parsed = this.parseResponse(translateResponseSchema, response, 'v2/translate');
    const results = parsed.translations.map(
      (translation): TextResult => ({
        text: translation.text,
        detectedSourceLang: translation.detected_source_language.toUpperCase(),
        ...(translation.billed_characters === undefined ? {} : { billedCharacters: translation.billed_characters }),
      }),
    );

    if (typeof text !== 'string') {
      return results;
    }

    const [first] = results;
    if (!first) {
      throw new ApiError('Translation response contained no translations', {
        httpStatusCode: response.statusCode,
      });
    }

    return first;
  }

  translateTextWithGlossary(
    text: string,
    glossary: GlossaryInfo,
    options: Omit<TranslateTextOptions, 'glossary' | 'sourceLang' | 'targetLang'> & { targetLang?: string } = {},
  ): Promise<TextResult> {
    return this.translateText(text, {
      ...options,
      sourceLang: glossary.sourceLang,
      targetLang: options.targetLang ?? (glossary.targetLang === 'EN' ? 'EN-GB' : glossary.targetLang),
      glossary,
    });
  }

  async rephraseText(text: string, options: RephraseTextOptions = {}): Promise<WriteResult> {
    if (text.length === 0) {
      throw new Error('text must not be empty');
    }

    if (options.style !== undefined && options.tone !== undefined) {
      throw new Error('Only one of style and tone may be set');
    }

    const json: Record<string, unknown> = { text: [text] };
    if (options.targetLang !== undefined) json.target_lang = options.targetLang.toUpperCase();
    if (options.style !== undefined) json.writing_style = options.style;
    if (options.tone !== undefined) json.tone = options.tone;

    const response = await this.request('v2/write/rephrase', { body: { kind: 'json', json } });
    const parsed = this.parseResponse(rephraseResponseSchema, response, 'v2/write/rephrase');
    const [improvement] = parsed.improvements;
    if (!improvement) {
      throw new ApiError('Rephrase response contained no improvements', { httpStatusCode: response.statusCode });
    }

    return {
      text: improvement.text,
      detectedSourceLanguage: improvement.detected_source_language.toUpperCase(),
      targetLanguage: improvement.target_language.toUpperCase(),
    };
  }

  async translateDocumentUpload(input: DocumentInput, options: DocumentTranslateOptions): Promise<DocumentHandle> {
    const filename = options.filename ?? (input instanceof ReadStream ? basename(String(input.path)) : undefined);
    if (filename === undefined) {
      throw new Error('filename is required when uploading a Buffer, string or unnamed stream');
    }

    // the multipart body is resent on retries, so stream input is read up front
    const content =
      typeof input === 'string' ? Buffer.from(input, 'utf8') : Buffer.isBuffer(input) ? input : await readBytes(input);

    const fields: Record<string, string> = languageParams(options);
    if (options.outputFormat !== undefined) {
      fields.output_format = options.outputFormat.toLowerCase();
    }

    const response = await this.request('v2/document', {
      body: { kind: 'multipart', fields, files: { file: { filename, content } } },
    });
    const parsed = this.parseResponse(documentUploadResponseSchema, response, 'v2/document');
    const handle = new DocumentHandle(parsed.document_id, parsed.document_key);

    translatorLog.debug('Document uploaded', { documentId: handle.documentId, filename });
    return handle;
  }

  async translateDocumentGetStatus(handle: DocumentHandle): Promise<DocumentStatus> {
    const response = await this.request(`v2/document/${encodeURIComponent(handle.documentId)}`, {
      body: { kind: 'json', json: { document_key: handle.documentKey } },
    });

    const parsed = documentStatusResponseSchema.safeParse(response.json);
    if (!parsed.success) {
      throw new DocumentTranslationError('Querying document status gave an empty response', handle, {
        httpStatusCode: response.statusCode,
      });
    }

    return new DocumentStatus({
      status: parsed.data.status,
      ...(parsed.data.seconds_remaining === undefined ? {} : { secondsRemaining: parsed.data.seconds_remaining }),
      ...(parsed.data.billed_characters === undefined ? {} : { billedCharacters: parsed.data.billed_characters }),
      ...(parsed.data.error_message == null ? {} : { errorMessage: parsed.data.error_message }),
    });
  }

  translateDocumentWaitUntilDone(
    handle: DocumentHandle,
    options: { timeoutMs?: number } = {},
  ): Promise<DocumentStatus> {
    return this.poller.waitUntilDone(handle, options);
  }

  /** Downloads the translated document into `sink`, or returns it as a stream. */
  translateDocumentDownload(handle: DocumentHandle): Promise<Readable>;
  translateDocumentDownload(handle: DocumentHandle, sink: Writable): Promise<void>;
  async translateDocumentDownload(handle: DocumentHandle, sink?: Writable): Promise<Readable | void> {
    const path = `v2/document/${encodeURIComponent(handle.documentId)}/result`;
    const body: RequestBody = { kind: 'json', json: { document_key: handle.documentKey } };

    if (sink) {
      await this.request(path, { body, onChunk: (chunk) => writeChunk(sink, chunk) }, { downloadingDocument: true });
      return;
    }

    const response = await this.request(path, { body, stream: true }, { downloadingDocument: true });
    if (!response.stream) {
      throw new ApiError('Document download returned no content', { httpStatusCode: response.statusCode });
    }

    return response.stream;
  }

  /**
   * Uploads a document, waits for the translation to finish and writes the
   * result to `output`. Failures after the upload carry the document handle.
   */
  translateDocument(
    input: DocumentInput,
    output: Writable,
    options: DocumentTranslateOptions,
  ): Promise<DocumentStatus> {
    return this.runDocumentJob(input, options, (handle) => this.translateDocumentDownload(handle, output));
  }

  /** Translates a file on disk; the output file is removed if the translation fails. */
  async translateDocumentFromFilepath(
    inputPath: string,
    outputPath: string,
    options: DocumentTranslateOptions,
  ): Promise<DocumentStatus> {
    try {
      return await this.runDocumentJob(
        createReadStream(inputPath),
        { ...options, filename: options.filename ?? basename(inputPath) },
        async (handle) => {
          await pipeline(await this.translateDocumentDownload(handle), createWriteStream(outputPath));
        },
      );
    } catch (error) {
      await rm(outputPath, { force: true });
      throw error;
    }
  }

  async getSourceLanguages(): Promise<Language[]> {
    return this.getLanguages('v2/languages');
  }

  async getTargetLanguages(): Promise<Language[]> {
    return this.getLanguages('v2/languages?type=target');
  }

  async getGlossaryLanguages(): Promise<GlossaryLanguagePair[]> {
    const response = await this.request('v2/glossary-language-pairs', { method: 'GET' });
    const parsed = this.parseResponse(glossaryLanguagePairsResponseSchema, response, 'v2/glossary-language-pairs');

    return parsed.supported_languages.map((pair) => ({
      sourceLang: pair.source_lang.toUpperCase(),
      targetLang: pair.target_lang.toUpperCase(),
    }));
  }

  async getUsage(): Promise<Usage> {
    const response = await this.request('v2/usage', { method: 'GET' });
    return this.parseResponse(usageResponseSchema, response, 'v2/usage');
  }

  async createGlossary(
    name: string,
    sourceLang: string,
    targetLang: string,
    entries: GlossaryEntries,
  ): Promise<GlossaryInfo> {
    if (Object.keys(entries).length === 0) {
      throw new Error('glossary entries must not be empty');
    }

    return this.createGlossaryInternal(name, sourceLang, targetLang, 'tsv', convertDictToTsv(entries));
  }

  async createGlossaryFromCsv(
    name: string,
    sourceLang: string,
    targetLang: string,
    csvData: string | Buffer,
  ): Promise<GlossaryInfo> {
    const entries = typeof csvData === 'string' ? csvData : csvData.toString('utf8');
    return this.createGlossaryInternal(name, sourceLang, targetLang, 'csv', entries);
  }

  async getGlossary(glossaryId: string): Promise<GlossaryInfo> {
    const path = `v2/glossaries/${encodeURIComponent(glossaryId)}`;
    const response = await this.request(path, { method: 'GET' }, { glossaryContext: true });
    return this.parseResponse(glossaryInfoSchema, response, path);
  }

  async listGlossaries(): Promise<GlossaryInfo[]> {
    const response = await this.request('v2/glossaries', { method: 'GET' }, { glossaryContext: true });
    return this.parseResponse(glossaryListResponseSchema, response, 'v2/glossaries').glossaries;
  }

  async getGlossaryEntries(glossary: string | GlossaryInfo): Promise<GlossaryEntries> {
    const path = `v2/glossaries/${encodeURIComponent(glossaryIdOf(glossary))}/entries`;
    const response = await this.request(
      path,
      { method: 'GET', headers: { Accept: 'text/tab-separated-values' } },
      { glossaryContext: true },
    );

    return convertTsvToDict(response.text ?? '');
  }

  async deleteGlossary(glossary: string | GlossaryInfo): Promise<void> {
    const path = `v2/glossaries/${encodeURIComponent(glossaryIdOf(glossary))}`;
    await this.request(path, { method: 'DELETE' }, { glossaryContext: true });
  }

  async close(): Promise<void> {
    await this.transport.close();
  }

  private async runDocumentJob(
    input: DocumentInput,
    options: DocumentTranslateOptions,
    download: (handle: DocumentHandle) => Promise<void>,
  ): Promise<DocumentStatus> {
    const handle = await this.translateDocumentUpload(input, options);

    let status: DocumentStatus;
    try {
      status = await this.translateDocumentWaitUntilDone(handle, { timeoutMs: options.timeoutMs });
      if (status.ok) {
        await download(handle);
      }
    } catch (error) {
      if (error instanceof DocumentTranslationError) {
        throw error;
      }

      throw new DocumentTranslationError(describeError(error), handle, {
        httpStatusCode: error instanceof ApiError ? error.httpStatusCode : undefined,
        cause: error,
      });
    }

    if (!status.ok) {
      throw new DocumentTranslationError(
        `Error occurred while translating document: ${status.errorMessage ?? 'unknown error'}`,
        handle,
      );
    }

    return status;
  }

  private async createGlossaryInternal(
    name: string,
    sourceLang: string,
    targetLang: string,
    entriesFormat: 'tsv' | 'csv',
    entries: string,
  ): Promise<GlossaryInfo> {
    if (name.length === 0) {
      throw new Error('glossary name must not be empty');
    }

    if (entries.length === 0) {
      throw new Error('glossary entries must not be empty');
    }

    const response = await this.request(
      'v2/glossaries',
      {
        body: {
          kind: 'json',
          json: {
            name,
            source_lang: removeRegionalVariant(sourceLang).toLowerCase(),
            target_lang: removeRegionalVariant(targetLang).toLowerCase(),
            entries_format: entriesFormat,
            entries,
          },
        },
      },
      { glossaryContext: true },
    );

    return this.parseResponse(glossaryInfoSchema, response, 'v2/glossaries');
  }

  private async getLanguages(path: string): Promise<Language[]> {
    const response = await this.request(path, { method: 'GET' });
    return this.parseResponse(languagesResponseSchema, response, path).map((language) => ({
      code: language.language.toUpperCase(),
      name: language.name,
      ...(language.supports_formality === undefined ? {} : { supportsFormality: language.supports_formality }),
    }));
  }

  private async request(
    path: string,
    options: ApiRequestOptions,
    context: InterpretContext = {},
  ): Promise<HttpResponse> {
    const request = createRequest({
      method: options.method ?? 'POST',
      url: new URL(path, this.baseUrl).toString(),
      headers: {
        ...options.headers,
        Authorization: `DeepL-Auth-Key ${this.authKey}`,
        'User-Agent': this.userAgent,
      },
      body: options.body,
      stream: options.stream,
      onChunk: options.onChunk,
    });

    const response = await this.executor.execute(request);
    raiseForStatus(response, context);
    return response;
  }

  private parseResponse<Output>(
    schema: z.ZodType<Output, z.ZodTypeDef, unknown>,
    response: HttpResponse,
    path: string,
  ): Output {
    const parsed = schema.safeParse(response.json);
    if (!parsed.success) {
      throw new ApiError(
        `Unexpected response from ${path}: ${parsed.error.issues[0]?.message ?? 'invalid payload'}`,
        { httpStatusCode: response.statusCode },
      );
    }

    return parsed.data;
  }
}

export { LIBRARY_NAME, LIBRARY_VERSION, SERVER_URL, SERVER_URL_FREE };
export type {
  AppInfo,
  DocumentInput,
  DocumentTranslateOptions,
  RephraseTextOptions,
  TranslateTextOptions,
  TranslatorOptions,
  TransportChoice,
};
