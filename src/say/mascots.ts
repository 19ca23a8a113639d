import { z } from "zod";

export const MASCOT_NAMES = ["ferris", "clippy"] as const;

export const mascotNameSchema = z.enum(MASCOT_NAMES);

export type MascotName = z.infer<typeof mascotNameSchema>;

export const DEFAULT_MASCOT: MascotName = "ferris";

const FERRIS = [
  "",
  "        \\",
  "         \\",
  "            _~^~^~_",
  "        \\) /  o o  \\ (/",
  "          '_   -   _'",
  "          / '-----' \\",
  "",
].join("\n");

const CLIPPY = [
  "",
  "        \\",
  "         \\",
  "            __",
  "           /  \\",
  "           |  |",
  "           @  @",
  "           |  |",
  "           || |/",
  "           || ||",
  "           |\\_/|",
  "           \\___/",
  "",
].join("\n");

const MASCOTS: Readonly<Record<MascotName, string>> = {
  ferris: FERRIS,
  clippy: CLIPPY,
};

export function getMascot(name: MascotName = DEFAULT_MASCOT): string {
  return MASCOTS[name];
}
