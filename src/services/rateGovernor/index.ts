export { RateGovernor, type GovernorDecision, type RateSnapshot } from './RateGovernor.js';
