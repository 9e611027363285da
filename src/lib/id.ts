import { customAlphabet } from 'nanoid';

const alphabet = 'abcdefghijklmnopqrstuvwxyz0123456789';

const agentSuffix = customAlphabet(alphabet, 8);

export function agentSessionId(): string {
  return `ag-${agentSuffix()}`;
}
