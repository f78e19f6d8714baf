export { CancellationScope } from './cancellation-scope.js';
