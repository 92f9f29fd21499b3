/**
 * Quake Query - USGS Earthquake Feed Client
 *
 * quake-query provides:
 * - An immutable QueryBuilder validated before any network activity
 * - Wall-clock time normalization to UTC instants
 * - Client-side country filtering with anti-meridian-safe point-in-polygon
 * - Results and failures as values, never thrown across the API
 *
 * @packageDocumentation
 */

// Client
export {
    EarthquakeClient,
    type EarthquakeClientOptions,
} from './services/earthquake-client.js';

// Query construction
export {
    QueryBuilder,
    type QueryExecutor,
    type QueryFetchOptions,
    type TimeInput,
} from './core/query-builder.js';
export {
    validateQuery,
    checkTimeRange,
    checkMagnitudeRange,
    type QueryDraft,
} from './core/parameter-validator.js';
export {
    normalizeLocalTime,
    toLocalComponents,
    localOffsetMinutes,
    parseUtcOffset,
    parseLocalDateTime,
    formatUtcInstant,
    formatUtcOffset,
    formatLocalInstant,
    MAX_OFFSET_MINUTES,
} from './core/time-normalizer.js';

// Execution
export {
    RequestExecutor,
    type RequestExecutorOptions,
} from './services/request-executor.js';
export { encodeQuery, decodeResponse } from './services/codec.js';
export {
    HTTPTransport,
    createHTTPTransport,
    type Transport,
    type TransportRequestOptions,
    type HTTPClientConfig,
} from './core/http-client.js';

// Boundaries
export {
    PolygonBoundaryIndex,
    getBoundaryIndex,
    setBoundaryIndex,
    resetBoundaryIndex,
    createBoundaryIndex,
} from './services/boundary-index.js';
export {
    GeoJSONFileBoundarySource,
    InMemoryBoundarySource,
    parseBoundaryCollection,
} from './services/boundary-loader.js';
export { applyCountryFilter } from './services/country-filter.js';
export { PointInPolygonEngine, DEFAULT_BOUNDARY_TOLERANCE } from './services/pip-engine.js';

// Configuration
export {
    loadClientConfig,
    DEFAULT_CLIENT_CONFIG,
    BUNDLED_BOUNDARIES_PATH,
    type QuakeQueryConfig,
} from './core/config.js';

// Types & errors
export * from './core/types/index.js';
