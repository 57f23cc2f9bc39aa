import { z } from "zod";
import { checkInput } from "../trig/index.ts";

/** Live validation of partially typed input, without computing anything */
export const checkAngleTool = {
  name: "check_angle",
  description: "Check whether text is an acceptable angle in degrees before calculating",
  parameters: z.object({
    angle: z.string().describe("Angle text to check"),
  }),
  execute: async (args: { angle: string }): Promise<string> => {
    const check = checkInput(args.angle);
    return `${check.state}: ${check.message}`;
  },
};
