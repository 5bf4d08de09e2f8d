export { TreeScanner } from './tree-scanner.js';
export type { TreeScannerOptions, ScanResult } from './tree-scanner.js';
