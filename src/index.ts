/**
 * hf-search: search models and datasets on the Hugging Face Hub.
 */

export { VERSION } from './version.js'
export { searchModels, searchDatasets, toHubRecord, DEFAULT_LIMIT } from './search/search.js'
export type { ModelSearchOptions, DatasetSearchOptions } from './search/search.js'
export { exportToCsv, exportToTxt, defaultExportFilename } from './export/index.js'
export { HubClient } from './hub/client.js'
export type { HubClientOptions } from './hub/client.js'
export { loadHubConfig } from './hub/hub-config.js'
export { ConfigError, ExportError, HubRequestError, HubResponseError, RequestTimeoutError, SearchError } from './utils/errors.js'
export type { ExportFormat, HubRecord, ResultKind } from './types.js'
