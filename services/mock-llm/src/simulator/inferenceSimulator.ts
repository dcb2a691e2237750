import {
  randomUniform,
  secondsToMs,
  sleep,
  type RandomSource,
  type SleepFn,
  type Clock,
} from '@inferlab/shared-utils';
import { recordLLMRequest } from '@inferlab/observability';
import type {
  Candidate,
  Content,
  FinishReason,
  FunctionDeclaration,
  GenerateContentRequest,
  GenerateContentResponse,
  ResponsePart,
  SchemaNode,
  UsageMetadata,
} from '@inferlab/shared-types';
import type { ChaosController } from '../chaos/chaosController';
import { ShapeRegistry, type ShapeMatch } from './shapeRegistry';
import {
  isEmptyDocument,
  isJsonObject,
  resolveSchemaType,
  synthesizeFromSchema,
  type JsonObject,
  type JsonValue,
} from './schemaSynthesis';

export const FILLER_RESPONSE =
  'I understand your request. Here is my response based on the information provided.';

export const STREAM_TEXT =
  'I understand your request. Let me help you with that. ' +
  'Based on the information provided, here is my response. ' +
  'Please let me know if you need any clarification.';

export const JSON_FALLBACK: JsonObject = {
  status: 'mock_json_response',
  note: 'Unidentified schema in prompt',
};

export const FUNCTION_CALL_FALLBACK: JsonObject = { status: 'mock_response' };

export const STREAM_PROMPT_TOKENS = 10;
export const COUNT_TOKENS_ESTIMATE = 50;

const TEXT_USAGE: UsageMetadata = { promptTokenCount: 10, candidatesTokenCount: 15, totalTokenCount: 25 };
const STRUCTURED_USAGE: UsageMetadata = { promptTokenCount: 50, candidatesTokenCount: 20, totalTokenCount: 70 };

const SERVICE_NAME = 'mock-llm-service';

export interface StreamChunk {
  textFragment: string;
  finishReason: FinishReason | null;
  /** Position of the chunk in its stream. */
  index: number;
  cumulativeTokenCount: number;
}

export type StreamFrame = { kind: 'chunk'; chunk: StreamChunk } | { kind: 'done' };

export interface SimulatorOptions {
  tokenDelaySeconds: number;
  tokenCount: number;
  embeddingDimension: number;
}

export interface SimulatorDependencies {
  chaos: ChaosController;
  registry?: ShapeRegistry;
  random?: RandomSource;
  sleep?: SleepFn;
  now?: Clock;
}

export type SynthesisKind = 'function_call' | 'json' | 'text';

export interface Synthesis {
  kind: SynthesisKind;
  /** Registry id when a known shape was used. */
  shapeId?: string;
  response: GenerateContentResponse;
}

export function extractPromptText(contents: Content[]): string {
  return contents
    .flatMap(content => content.parts)
    .map(part => part.text ?? '')
    .join('');
}

function firstFunctionDeclaration(request: GenerateContentRequest): FunctionDeclaration | undefined {
  return (request.tools ?? []).flatMap(tool => tool.functionDeclarations ?? [])[0];
}

/** A parameters object whose only property is itself an object wraps the real argument shape. */
function findWrapperProperty(parameters: SchemaNode | undefined): { name: string; schema: SchemaNode } | undefined {
  const entries = Object.entries(parameters?.properties ?? {});
  if (entries.length !== 1) {
    return undefined;
  }
  const [name, schema] = entries[0];
  return resolveSchemaType(schema) === 'OBJECT' && schema.properties ? { name, schema } : undefined;
}

function buildResponse(parts: ResponsePart[], usageMetadata: UsageMetadata): GenerateContentResponse {
  const candidate: Candidate = {
    content: { parts, role: 'model' },
    finishReason: 'STOP',
    index: 0,
  };
  return { candidates: [candidate], usageMetadata: { ...usageMetadata } };
}

export function toWireChunk(chunk: StreamChunk): GenerateContentResponse {
  return {
    candidates: [
      {
        content: { parts: [{ text: chunk.textFragment }], role: 'model' },
        finishReason: chunk.finishReason,
        index: 0,
      },
    ],
    usageMetadata: {
      promptTokenCount: STREAM_PROMPT_TOKENS,
      candidatesTokenCount: chunk.cumulativeTokenCount,
      totalTokenCount: STREAM_PROMPT_TOKENS + chunk.cumulativeTokenCount,
    },
  };
}

/**
 * Answers generative-API calls with synthetic but protocol-conformant output.
 * Latency comes from the chaos window at call time; nothing here ever calls a
 * real model.
 */
export class InferenceSimulator {
  private readonly chaos: ChaosController;
  private readonly registry: ShapeRegistry;
  private readonly random: RandomSource;
  private readonly sleep: SleepFn;
  private readonly now: Clock;

  constructor(private readonly options: SimulatorOptions, deps: SimulatorDependencies) {
    this.chaos = deps.chaos;
    this.registry = deps.registry ?? new ShapeRegistry();
    this.random = deps.random ?? Math.random;
    this.sleep = deps.sleep ?? sleep;
    this.now = deps.now ?? Date.now;
  }

  /** Suspends for a delay drawn from the current latency window; returns the delay in seconds. */
  async think(): Promise<number> {
    const { latency_min, latency_max } = this.chaos.snapshot();
    const delaySeconds = randomUniform(latency_min, latency_max, this.random);
    await this.sleep(secondsToMs(delaySeconds));
    return delaySeconds;
  }

  async generate(request: GenerateContentRequest, model?: string): Promise<Synthesis> {
    const startedAt = this.now();
    await this.think();
    this.chaos.leakIfActive();

    const synthesis = this.synthesize(request);
    recordLLMRequest({
      service: SERVICE_NAME,
      model,
      operation: `generate:${synthesis.kind}`,
      durationMs: this.now() - startedAt,
      promptTokens: synthesis.response.usageMetadata.promptTokenCount,
      completionTokens: synthesis.response.usageMetadata.candidatesTokenCount,
    });
    return synthesis;
  }

  /** Chooses the response family for a request without any delay. */
  synthesize(request: GenerateContentRequest): Synthesis {
    const promptText = extractPromptText(request.contents);
    const declaration = firstFunctionDeclaration(request);

    if (declaration) {
      const { args, shapeId } = this.functionCallArguments(declaration, promptText);
      return {
        kind: 'function_call',
        shapeId,
        response: buildResponse([{ functionCall: { name: declaration.name, args } }], STRUCTURED_USAGE),
      };
    }

    const mimeType = request.generationConfig?.responseMimeType ?? '';
    if (mimeType.includes('application/json')) {
      const { document, shapeId } = this.jsonDocument(request.generationConfig?.responseSchema, promptText);
      return {
        kind: 'json',
        shapeId,
        response: buildResponse([{ text: JSON.stringify(document) }], STRUCTURED_USAGE),
      };
    }

    return { kind: 'text', response: buildResponse([{ text: FILLER_RESPONSE }], TEXT_USAGE) };
  }

  jsonDocument(schema: SchemaNode | undefined, promptText: string): { document: JsonValue; shapeId?: string } {
    const identifier = schema?.title;
    const match = identifier ? this.registry.resolveById(identifier) : this.registry.resolveByKeywords(promptText);
    if (match) {
      return { document: match.document, shapeId: match.id };
    }

    const document = schema ? synthesizeFromSchema(schema) : undefined;
    if (document === undefined || isEmptyDocument(document)) {
      return { document: { ...JSON_FALLBACK } };
    }
    return { document };
  }

  functionCallArguments(
    declaration: FunctionDeclaration,
    promptText: string
  ): { args: JsonObject; shapeId?: string } {
    const parameters = declaration.parameters;
    const wrapper = findWrapperProperty(parameters);
    const target = wrapper ? wrapper.schema : parameters;
    const identifier = parameters?.title ?? target?.title;

    let match: ShapeMatch | undefined;
    if (identifier) {
      match = this.registry.resolveById(identifier);
    } else {
      // Untitled parameters: the function name may itself be a shape id.
      const propertyNames = Object.keys(target?.properties ?? {}).join(' ');
      match =
        this.registry.resolveById(declaration.name) ??
        this.registry.resolveByKeywords(propertyNames) ??
        this.registry.resolveByKeywords(promptText);
    }

    if (match) {
      return {
        args: wrapper ? { [wrapper.name]: match.document } : match.document,
        shapeId: match.id,
      };
    }

    const synthesized = parameters ? synthesizeFromSchema(parameters) : undefined;
    if (synthesized !== undefined && isJsonObject(synthesized) && !isEmptyDocument(synthesized)) {
      return { args: synthesized };
    }
    return { args: { ...FUNCTION_CALL_FALLBACK } };
  }

  /**
   * Thinking delay, then one word per chunk with the inter-token delay
   * between chunks. Only the last chunk carries STOP; a `done` frame always
   * follows. Each call starts a fresh cycle.
   */
  async *streamGenerate(model?: string): AsyncGenerator<StreamFrame> {
    const startedAt = this.now();
    await this.think();
    this.chaos.leakIfActive();

    const words = STREAM_TEXT.split(/\s+/).filter(word => word.length > 0);
    const count = Math.min(words.length, this.options.tokenCount);

    for (let i = 0; i < count; i++) {
      if (i > 0) {
        await this.sleep(secondsToMs(this.options.tokenDelaySeconds));
      }
      yield {
        kind: 'chunk',
        chunk: {
          textFragment: `${words[i]} `,
          finishReason: i === count - 1 ? 'STOP' : null,
          index: i,
          cumulativeTokenCount: i + 1,
        },
      };
    }

    recordLLMRequest({
      service: SERVICE_NAME,
      model,
      operation: 'stream',
      durationMs: this.now() - startedAt,
      promptTokens: STREAM_PROMPT_TOKENS,
      completionTokens: count,
    });
    yield { kind: 'done' };
  }

  /**
   * Dense vector per input. Every coordinate is 0.1 except `index mod dim`,
   * which is raised to 0.9 (plus 0.001 per full wrap) so no two vectors in a
   * batch coincide and none is constant.
   */
  embedding(index: number): number[] {
    const dimension = this.options.embeddingDimension;
    const values = new Array<number>(dimension).fill(0.1);
    values[index % dimension] = 0.9 + 0.001 * Math.floor(index / dimension);
    return values;
  }

  embedBatch(count: number): number[][] {
    return Array.from({ length: count }, (_, index) => this.embedding(index));
  }

  countTokens(): number {
    return COUNT_TOKENS_ESTIMATE;
  }
}
