// Width of destinations.name
export const MAX_DESTINATION_NAME_LENGTH = 255;

export interface Destination {
  id: number;
  name: string;
  createdAt: Date;
}

export interface DestinationResponse {
  id: number;
  name: string;
  created_at: string;
}

export interface DestinationDeletion {
  message: string;
  removedNotes: number;
}

export function toDestinationResponse(d: Destination): DestinationResponse {
  return { id: d.id, name: d.name, created_at: d.createdAt.toISOString() };
}
