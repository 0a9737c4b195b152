import { ControllerRequest, ControllerResponse, ControllerTransport } from "../../src/device/controllerClient";

export interface FakeController {
  transport: ControllerTransport;
  requests: ControllerRequest[];
  setting: Record<string, unknown>;
  /** Status returned to the next POST, then reset to 200. */
  failNextWrite?: { status: number; body: string };
}

/** In-memory controller holding one `usg` setting behind the `{ meta, data }` envelope. */
export function fakeController(initial: Record<string, unknown>): FakeController {
  const controller: FakeController = {
    requests: [],
    setting: { _id: "setting-1", key: "usg", site_id: "site-1", ...initial },
    transport: async (request: ControllerRequest): Promise<ControllerResponse> => {
      controller.requests.push(request);
      if (request.method === "GET") {
        return { status: 200, body: JSON.stringify({ meta: { rc: "ok" }, data: [controller.setting] }) };
      }
      if (controller.failNextWrite) {
        const failure = controller.failNextWrite;
        controller.failNextWrite = undefined;
        return failure;
      }
      controller.setting = JSON.parse(request.body ?? "{}");
      return { status: 200, body: JSON.stringify({ meta: { rc: "ok" }, data: [] }) };
    }
  };
  return controller;
}
