export class Level2App {
  public id?: number;
  public stationId?: string;
  public dateTime?: Date;
  public airTemp?: number | null;
  public dewPointTemperature?: number | null;
  public relativeHumidity?: number | null;
  public windSpeed?: number | null;
  public windDirection?: number | null;
  public windGust?: number | null;
  public solarRadiation?: number | null;
  public snowSmoothed?: number | null;
  public precipAccum?: number | null;
  public precipIntensity?: number | null;
  public snowDepth?: number | null;
  public snowInterval?: number | null;
  public snowWaterEquiv?: number | null;
  public vaporPressure?: number | null;
  public cloudFactor?: number | null;
}
