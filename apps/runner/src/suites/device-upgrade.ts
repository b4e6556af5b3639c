import { step } from "../actions/composite.js";
import { performDeviceUpgrade } from "../library/api/device-upgrade.js";
import {
  createObjectAndVerify,
  deleteObjectAndVerify,
  getObjectAndVerify,
  objectRecordSchema,
} from "../library/api/objects.js";
import type { TestSuite } from "./types.js";

const OLD_PHONE_NAME = "iPhone 12";
const OLD_PHONE_DATA = { color: "Blue", storage: "64GB" };
const NEW_PHONE_NAME = "iPhone 15";

export const deviceUpgradeSuite: TestSuite = {
  id: "device-upgrade",
  title: "Device upgrade flow",
  requires: ["http"],
  cases: [
    {
      title: "Upgrade an old phone to a new phone",
      steps: [
        step(
          createObjectAndVerify,
          (env) => ({ url: env.apiUrl, name: OLD_PHONE_NAME, data: OLD_PHONE_DATA }),
          { store: "oldPhone" },
        ),
        step(
          performDeviceUpgrade,
          (env, state) => ({
            url: env.apiUrl,
            oldDeviceId: state.read("oldPhone", objectRecordSchema).id,
            newDeviceName: NEW_PHONE_NAME,
          }),
          { store: "newPhone" },
        ),
        step(getObjectAndVerify, (env, state) => ({
          url: env.apiUrl,
          id: state.read("newPhone", objectRecordSchema).id,
          expectedName: NEW_PHONE_NAME,
          expectedData: OLD_PHONE_DATA,
        })),
        step(deleteObjectAndVerify, (env, state) => ({
          url: env.apiUrl,
          id: state.read("newPhone", objectRecordSchema).id,
        })),
      ],
    },
  ],
};
