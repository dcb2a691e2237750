import type { JsonObject } from './schemaSynthesis';

// Known structured-output shapes, keyed by the schema title the calling
// agent framework sends.

export type CustomerDependentAction = {
  action: string;
  is_customer_dependent: boolean;
  customer_action: string | null;
  agent_action: string | null;
};

export type AgentIntentionProposal = {
  condition: string;
  is_agent_intention: boolean;
};

export type ToolRunningAction = {
  action: string;
  rationale: string;
  is_tool_running_only: boolean;
};

export type ContinuousProposition = {
  rationale: string;
  is_continuous: boolean;
};

export type RelativeAction = {
  actions: Array<{
    index: string;
    conditions: string[];
    action: string;
    needs_rewrite_rationale: string;
    needs_rewrite: boolean;
  }>;
};

export type ReachableNodesEvaluation = {
  step_action: string;
  step_action_completed: string;
  children_conditions: string[] | null;
};

export type CannedResponsePreamble = {
  preamble: string;
};

export type DisambiguationMatches = {
  tldr: string;
  ambiguity_condition_met: boolean;
  disambiguation_requested: boolean;
  is_ambiguous: boolean;
  guidelines: string[];
  clarification_action: string | null;
};

export type ObservationalMatches = {
  checks: JsonObject[];
};

export type CoherenceCheck = {
  is_coherent: boolean;
};

export interface ShapeDefinition {
  id: string;
  /**
   * Legacy prompt keywords. Only consulted when a request carries no schema
   * identifier; several keywords can occur in one prompt, so registry order
   * is the tie-break.
   */
  keywords: readonly string[];
  generate: () => JsonObject;
}

function shape<T extends JsonObject>(id: string, keywords: readonly string[], generate: () => T): ShapeDefinition {
  return { id, keywords, generate };
}

export const DEFAULT_SHAPES: readonly ShapeDefinition[] = [
  shape<CustomerDependentAction>('CustomerDependentActionSchema', ['is_customer_dependent'], () => ({
    action: 'reply',
    is_customer_dependent: false,
    customer_action: null,
    agent_action: null,
  })),
  shape<AgentIntentionProposal>('AgentIntentionProposerSchema', ['is_agent_intention'], () => ({
    condition: 'The user greets',
    is_agent_intention: false,
  })),
  shape<ToolRunningAction>('ToolRunningActionSchema', ['is_tool_running_only'], () => ({
    action: 'reply',
    rationale: 'No tool needed',
    is_tool_running_only: false,
  })),
  shape<ContinuousProposition>('GuidelineContinuousPropositionSchema', ['is_continuous'], () => ({
    rationale: 'Greeting is polite',
    is_continuous: true,
  })),
  shape<RelativeAction>('RelativeActionSchema', ['needs_rewrite'], () => ({
    actions: [
      {
        index: '0',
        conditions: [],
        action: 'reply',
        needs_rewrite_rationale: 'No rewrite needed',
        needs_rewrite: false,
      },
    ],
  })),
  shape<ReachableNodesEvaluation>('ReachableNodesEvaluationSchema', ['step_action'], () => ({
    step_action: 'Do something',
    step_action_completed: 'true',
    children_conditions: null,
  })),
  shape<CannedResponsePreamble>('CannedResponsePreambleSchema', ['preamble'], () => ({
    preamble: 'I verified the information.',
  })),
  shape<DisambiguationMatches>('DisambiguationGuidelineMatchesSchema', ['is_ambiguous', 'ambiguity'], () => ({
    tldr: 'User wants to do something',
    ambiguity_condition_met: false,
    disambiguation_requested: false,
    is_ambiguous: false,
    guidelines: [],
    clarification_action: null,
  })),
  shape<ObservationalMatches>('GenericObservationalGuidelineMatchesSchema', [], () => ({
    checks: [],
  })),
  shape<CoherenceCheck>('CoherenceCheckSchema', ['is_coherent'], () => ({
    is_coherent: true,
  })),
];

export interface ShapeMatch {
  id: string;
  document: JsonObject;
}

export class ShapeRegistry {
  private readonly byId = new Map<string, ShapeDefinition>();

  constructor(private readonly shapes: readonly ShapeDefinition[] = DEFAULT_SHAPES) {
    for (const definition of shapes) {
      this.byId.set(definition.id, definition);
    }
  }

  ids(): string[] {
    return this.shapes.map(definition => definition.id);
  }

  resolveById(id: string): ShapeMatch | undefined {
    const definition = this.byId.get(id);
    return definition ? { id: definition.id, document: definition.generate() } : undefined;
  }

  /** Legacy fallback: first registry entry with a keyword contained in `text` (case-insensitive). */
  resolveByKeywords(text: string): ShapeMatch | undefined {
    const haystack = text.toLowerCase();
    if (!haystack) {
      return undefined;
    }
    const definition = this.shapes.find(candidate =>
      candidate.keywords.some(keyword => haystack.includes(keyword.toLowerCase()))
    );
    return definition ? { id: definition.id, document: definition.generate() } : undefined;
  }
}
