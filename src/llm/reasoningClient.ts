import { AgentRole } from '../core/types';

export interface ReasoningRequest {
  role: AgentRole;
  instruction: string;
  context: Record<string, unknown>;
}

export interface ReasoningClient {
  generate(request: ReasoningRequest): Promise<string>;
}

// Roles whose calls carry a gate decision or the trade shape go to the premium model.
export const PREMIUM_ROLES: readonly AgentRole[] = ['strategist', 'risk_manager', 'portfolio_manager'];
