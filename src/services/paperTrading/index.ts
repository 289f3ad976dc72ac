export { PaperTradingEngine, type PaperTradingConfig } from './PaperTradingEngine.js';
