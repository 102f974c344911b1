export { DirectiveRouter } from './router';
export type { ResolvedHandler, RouteMatch } from './router';
export { buildHandlerTable, tableKey, bind, REPORT_STATE } from './handler-table';
export type { BoundHandler, HandlerEntry, HandlerTable } from './handler-table';
export { parseDirective } from './directive';
export type { Directive } from './directive';
export {
  SmartHomeError,
  UnknownDeviceError,
  UnsupportedCommandError,
  MalformedDirectiveError,
  ValidationError,
  ActuationNotifyError,
} from './errors';
export type { ControlHandler, DirectiveContext, HandlerResult } from './handlers/types';
