/**
 * Generative-API wire types (generateContent / streamGenerateContent /
 * embedContent / countTokens request and response bodies).
 */

export type Role = 'user' | 'model' | 'system';

export interface TextPart {
  text: string;
}

export interface FunctionCall {
  name: string;
  args: Record<string, unknown>;
}

export interface FunctionCallPart {
  functionCall: FunctionCall;
}

export type ResponsePart = TextPart | FunctionCallPart;

export interface RequestPart {
  text?: string;
  [key: string]: unknown;
}

export interface Content {
  role?: string;
  parts: RequestPart[];
}

export type SchemaType = 'OBJECT' | 'ARRAY' | 'STRING' | 'BOOLEAN' | 'INTEGER' | 'NUMBER';

/** JSON-schema-like node used by responseSchema and function parameters. Type names are matched case-insensitively. */
export interface SchemaNode {
  type?: string;
  title?: string;
  description?: string;
  properties?: Record<string, SchemaNode>;
  items?: SchemaNode;
  enum?: string[];
  nullable?: boolean;
  required?: string[];
}

export interface FunctionDeclaration {
  name: string;
  description?: string;
  parameters?: SchemaNode;
}

export interface Tool {
  functionDeclarations?: FunctionDeclaration[];
}

export interface GenerationConfig {
  temperature?: number;
  maxOutputTokens?: number;
  responseMimeType?: string;
  responseSchema?: SchemaNode;
}

export interface GenerateContentRequest {
  contents: Content[];
  generationConfig?: GenerationConfig;
  tools?: Tool[];
  systemInstruction?: Content;
}

export type FinishReason = 'STOP';

export interface Candidate {
  content: {
    parts: ResponsePart[];
    role: 'model';
  };
  finishReason: FinishReason | null;
  index: number;
}

export interface UsageMetadata {
  promptTokenCount: number;
  candidatesTokenCount: number;
  totalTokenCount: number;
}

export interface GenerateContentResponse {
  candidates: Candidate[];
  usageMetadata: UsageMetadata;
}

export interface EmbeddingValues {
  values: number[];
}

export interface EmbedContentResponse {
  embedding: EmbeddingValues;
}

export interface BatchEmbedContentsResponse {
  embeddings: EmbeddingValues[];
}

export interface PredictResponse {
  predictions: Array<{ embeddings: EmbeddingValues }>;
}

export interface CountTokensResponse {
  totalTokens: number;
}
