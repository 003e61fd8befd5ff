export const EARTH_RADIUS_KM = 6371;

const toRadians = (degrees: number): number => degrees * Math.PI / 180;

/**
 * Great-circle distance in kilometres between two latitude/longitude points.
 * Inputs are not range checked; NaN in, NaN out.
 */
export const haversineDistanceKm = (
    lat1: number,
    lon1: number,
    lat2: number,
    lon2: number
): number => {
    const phi1 = toRadians(lat1);
    const phi2 = toRadians(lat2);
    const deltaPhi = toRadians(lat2 - lat1);
    const deltaLambda = toRadians(lon2 - lon1);

    const a = Math.sin(deltaPhi / 2) ** 2
        + Math.cos(phi1) * Math.cos(phi2) * Math.sin(deltaLambda / 2) ** 2;

    return 2 * EARTH_RADIUS_KM * Math.asin(Math.sqrt(a));
};
