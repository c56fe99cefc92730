import { z } from 'zod/v4';

export const latitudeSchema = z.number().min(-90).max(90);

export const longitudeSchema = z.number().min(-180).max(180);

export const coordinatesSchema = z.object({
    latitude: latitudeSchema,
    longitude: longitudeSchema,
});

export type Coordinates = z.infer<typeof coordinatesSchema>;

/**
 * A coordinate resolved for a named place
 */
export interface ResolvedLocation extends Coordinates {
    label: string;
}

export const isValidCoordinates = (
    value: Partial<Coordinates> | null | undefined,
): value is Coordinates => coordinatesSchema.safeParse(value).success;
