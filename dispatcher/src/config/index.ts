export { loadConfig } from './env.js';
export {
  parseFleet,
  loadFleetFile,
  runnerRegistrationSchema,
  type FleetDefinition,
} from './fleet.js';
