export { RealReturnForm } from './RealReturnForm';
export { RealReturnChart } from './RealReturnChart';
export { ResultSummary } from './ResultSummary';
export { OutcomeBadge } from './OutcomeBadge';
