export {
  NS,
  INSTANCES,
  instanceId,
  capabilitiesFor,
  interfacesFor,
  discoveryEndpointFor,
} from './catalog';
export type { InstanceName } from './catalog';
