/**
 * Bot module exports
 * Robot, its factory and handler guards
 */

export { type RobotDependencies, Robot } from './robot.js';

export {
  type ChatAdapterBuilder,
  type RobotFactoryOptions,
  createRobot,
  createStore,
  defaultChatAdapters,
} from './factory.js';

export { deniedText, onlyAllow } from './guards.js';
