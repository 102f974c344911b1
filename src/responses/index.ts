export {
  buildDiscoveryResponse,
  buildDirectiveResponse,
  buildStateReport,
  buildErrorResponse,
} from './response-builder';
