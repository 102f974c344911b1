export { snapshot, changeToProperty, SAMPLE_UNCERTAINTY_MS } from './state-reporter';
