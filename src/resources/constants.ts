/**
 * Constants resource - the fixed parameters of the tangent engine
 */

import { EPSILON, PI, SERIES_TERMS } from "../trig/index.ts";
import { VERSION } from "../version.ts";

export const constantsResource = {
  uri: "trig://constants",
  name: "Trig Engine Constants",
  description: "π, the undefined-tangent epsilon and the Maclaurin term count used by every calculation",
  mimeType: "application/json",
  load: async () => ({
    text: JSON.stringify(
      { pi: PI, epsilon: EPSILON, series_terms: SERIES_TERMS, version: VERSION },
      null,
      2,
    ),
  }),
};

export const allResources = [constantsResource];
