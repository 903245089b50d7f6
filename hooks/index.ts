export { useRealReturn } from './useRealReturn';
