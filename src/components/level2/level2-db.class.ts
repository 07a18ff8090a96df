export class Level2Db {
  public id?: number;
  public station_id?: string;
  public date_time?: string | Date; // pg hands back a Date, sqlite a string
  public air_temp?: number | null;
  public dew_point_temperature?: number | null;
  public relative_humidity?: number | null;
  public wind_speed?: number | null;
  public wind_direction?: number | null;
  public wind_gust?: number | null;
  public solar_radiation?: number | null;
  public snow_smoothed?: number | null;
  public precip_accum?: number | null;
  public precip_intensity?: number | null;
  public snow_depth?: number | null;
  public snow_interval?: number | null;
  public snow_water_equiv?: number | null;
  public vapor_pressure?: number | null;
  public cloud_factor?: number | null;
}
