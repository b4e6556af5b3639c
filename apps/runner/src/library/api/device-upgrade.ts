import { defineComposite, step } from "../../actions/composite.js";
import {
  createObjectAndVerify,
  deleteObjectAndVerify,
  getObjectAndExpectNotFound,
  getObjectAndVerify,
  objectRecordSchema,
} from "./objects.js";

export interface DeviceUpgradeInput {
  url: string;
  oldDeviceId: string;
  newDeviceName: string;
}

/**
 * Moves a device's data onto a newly registered device and recycles the old
 * one: read old, create new with the old data, delete old, confirm it is
 * gone. Produces the new device record.
 */
export const performDeviceUpgrade = defineComposite({
  name: "perform_device_upgrade",
  steps: [
    step(getObjectAndVerify, (input: DeviceUpgradeInput) => ({ url: input.url, id: input.oldDeviceId }), {
      store: "oldDevice",
    }),
    step(
      createObjectAndVerify,
      (input: DeviceUpgradeInput, state) => ({
        url: input.url,
        name: input.newDeviceName,
        data: state.read("oldDevice", objectRecordSchema).data ?? null,
      }),
      { store: "newDevice" },
    ),
    step(deleteObjectAndVerify, (input: DeviceUpgradeInput) => ({ url: input.url, id: input.oldDeviceId })),
    step(getObjectAndExpectNotFound, (input: DeviceUpgradeInput) => ({ url: input.url, id: input.oldDeviceId })),
  ],
  produce: (_results, state) => state.read("newDevice", objectRecordSchema),
});
