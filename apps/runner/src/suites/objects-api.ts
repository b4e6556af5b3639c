import { step } from "../actions/composite.js";
import {
  getObjectsByIdsAndVerify,
  requestByGetAndFailure,
  requestByGetAndSuccess,
} from "../library/api/objects.js";
import type { TestSuite } from "./types.js";

export const objectsApiSuite: TestSuite = {
  id: "objects-api",
  title: "Object store API",
  requires: ["http"],
  cases: [
    {
      title: "GET on the object collection succeeds",
      steps: [step(requestByGetAndSuccess, (env) => ({ url: env.apiUrl }))],
    },
    {
      title: "GET on an unknown endpoint does not succeed",
      steps: [step(requestByGetAndFailure, (env) => ({ url: `${env.apiUrl}/invalid_endpoint` }))],
    },
    {
      title: "GET filtered to one id returns exactly that object",
      steps: [step(getObjectsByIdsAndVerify, (env) => ({ url: env.apiUrl, ids: ["3"] }))],
    },
    {
      title: "GET filtered to several ids returns exactly those objects",
      steps: [step(getObjectsByIdsAndVerify, (env) => ({ url: env.apiUrl, ids: ["3", "5", "10"] }))],
    },
  ],
};
