export { SmartHomeService } from './smart-home-service';
export type { DirectiveOutcome, OutcomeStatus, SmartHomeServiceOptions } from './smart-home-service';
export { createMessageHandler } from './message-handler';
export type { MessageHandler } from './message-handler';
