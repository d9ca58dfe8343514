/**
 * Cloud Functions entry point
 *
 * POST /api/parseLog - workout log text to exercise records
 */

export {parseLog} from './api/parseLog';
