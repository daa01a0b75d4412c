export * from './types.js';
export {
    buildDashboard,
    processPanels,
    processVariables,
    extractTags,
    extractTimeRange,
    extractRefreshInterval,
    extractGridPos,
    extractTargets,
    extractOptions,
    extractFieldConfig,
    getStringOrDefault
} from './assembler.js';
export { generatePanelsFromMetrics, inferUnit, mapVisualizationType } from './panels.js';
