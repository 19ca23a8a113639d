import { z } from "zod";

import { type MascotName, mascotNameSchema } from "../../say/mascots.js";

export const widthSchema = z.number().int().nonnegative().safe();

export interface Settings {
  mascot: MascotName;
  width: number;
}

export const settingsFileSchema = z
  .object({
    mascot: mascotNameSchema.optional(),
    width: widthSchema.optional(),
  })
  .strict();

export type SettingsFile = z.infer<typeof settingsFileSchema>;
