import { FlowDefinition } from '../types';
import { loginFlow } from './login.flow';
import { createRescheduleFlow } from './reschedule.flow';
import { createSlotScanFlow } from './slot-scan.flow';

export const flows: FlowDefinition[] = [
  loginFlow,
  createRescheduleFlow({ page: 'unknown' }),
  createSlotScanFlow({ location: '', candidates: [], slots: [], busy: false, booked: false }),
];

export function getFlow(name: string): FlowDefinition | undefined {
  return flows.find((flow) => flow.name === name);
}
