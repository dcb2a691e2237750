// Core wire types shared by the mock server and the load generator

export type SessionId = string;
export type AgentId = string;
export type EventId = string;

export enum AnalysisMode {
  IO_BOUND = 'IO_BOUND',
  CPU_BOUND = 'CPU_BOUND',
}

export enum ChaosStatus {
  LATENCY_SPIKE = 'LATENCY SPIKE ACTIVATED',
  MEMORY_LEAK = 'MEMORY LEAK ACTIVATED',
  CPU_STRESS = 'CPU STRESS ACTIVATED',
  ERROR_RATE = 'ERROR RATE SET',
  NORMALIZED = 'SYSTEM NORMALIZED',
}

export enum EventSource {
  CUSTOMER = 'customer',
  AI_AGENT = 'ai_agent',
  SYSTEM = 'system',
}

export enum EventKind {
  MESSAGE = 'message',
  STATUS = 'status',
}

// Agent endpoints

export interface AgentRequest {
  query: string;
  user_id: string;
  mock_mode?: boolean;
}

export interface ChatResponse {
  response_text: string;
  processing_time: string;
  server_memory_usage_mb: number;
}

export interface AnalyzeResponse {
  status: string;
  mode: AnalysisMode;
}

export interface ErrorResponse {
  error: string;
  code?: string;
}

// Chaos state as reported to callers

export interface SimulationSnapshot {
  latency_min: number;
  latency_max: number;
  error_rate: number;
  memory_leak_active: boolean;
  cpu_stress_active: boolean;
  leaked_bytes: number;
}

export interface HealthResponse {
  status: 'healthy';
  timestamp: number;
  config: SimulationSnapshot;
}

export interface ChaosStatusResponse {
  status: ChaosStatus;
}

// Session-oriented conversation backend

export interface AgentDescriptor {
  id: AgentId;
  name: string;
}

export interface SessionDescriptor {
  id: SessionId;
  agent_id: AgentId;
  created_at: string;
}

export interface SessionEventData {
  message?: string;
  status?: string;
}

export interface SessionEvent {
  id: EventId;
  offset: number;
  source: EventSource;
  kind: EventKind;
  data: SessionEventData;
  created_at: string;
}

export interface CreateSessionRequest {
  agent_id: AgentId;
}

export interface CreateEventRequest {
  kind: EventKind;
  source: EventSource;
  message: string;
}

export * from './generative';
