export { TicketUseCase, type UseCaseResult } from './TicketUseCase.js';
export { CreateTicketUseCase } from './CreateTicketUseCase.js';
export { ChangeTicketStatusUseCase } from './ChangeTicketStatusUseCase.js';
export { ChangeTicketPriorityUseCase } from './ChangeTicketPriorityUseCase.js';
export { AddTicketResponseUseCase, type PersistedResponse } from './AddTicketResponseUseCase.js';
export { DeleteTicketUseCase } from './DeleteTicketUseCase.js';
export { GetTicketUseCase } from './GetTicketUseCase.js';
export { ListTicketResponsesUseCase } from './ListTicketResponsesUseCase.js';
