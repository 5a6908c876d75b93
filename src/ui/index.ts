/**
 * UI Module
 * Terminal output
 */

export {
    renderStopDetails,
    renderRoadSearch,
    renderNearbyStops,
    renderArrivals,
    renderCacheInfo,
    getLoadIndicator,
} from './render';
