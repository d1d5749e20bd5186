export { scripted_strategy } from './scripted-strategy';
export { constant_strategy } from './constant-strategy';
