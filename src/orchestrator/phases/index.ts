export { handleIntake } from './intake.js';
export { handlePlanning } from './planning.js';
export { handleExecution } from './execution.js';
export { handleReflection } from './reflection.js';
