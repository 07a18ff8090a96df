// The measurement columns whose values are captured in the audit store when a row is deleted.
// The order here is the order the audit entries are written in. Tracking a new column is a matter of adding it here (and to the Level2App/Level2Db classes).
export const trackedFields = [
  {column: 'air_temp', property: 'airTemp'},
  {column: 'dew_point_temperature', property: 'dewPointTemperature'},
  {column: 'relative_humidity', property: 'relativeHumidity'},
  {column: 'wind_speed', property: 'windSpeed'},
  {column: 'wind_direction', property: 'windDirection'},
  {column: 'wind_gust', property: 'windGust'},
  {column: 'solar_radiation', property: 'solarRadiation'},
  {column: 'snow_smoothed', property: 'snowSmoothed'},
  {column: 'precip_accum', property: 'precipAccum'},
  {column: 'precip_intensity', property: 'precipIntensity'},
  {column: 'snow_depth', property: 'snowDepth'},
  {column: 'snow_interval', property: 'snowInterval'},
  {column: 'snow_water_equiv', property: 'snowWaterEquiv'},
  {column: 'vapor_pressure', property: 'vaporPressure'},
  {column: 'cloud_factor', property: 'cloudFactor'}
] as const;

export type TrackedField = typeof trackedFields[number];
export type TrackedColumn = TrackedField['column'];
export type TrackedProperty = TrackedField['property'];
