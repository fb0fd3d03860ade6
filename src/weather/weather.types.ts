export interface Coordinates {
  latitude: number;
  longitude: number;
}

export type WeatherLookup =
  | {
      ok: true;
      text: string;
      description: string;
      temperature: number;
      coordinates: Coordinates;
    }
  | { ok: false; text: string };
