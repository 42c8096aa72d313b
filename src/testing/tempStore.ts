import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { JsonStore } from "../store/jsonStore.js";

export const createTempStore = async () => {
  const dir = await mkdtemp(path.join(os.tmpdir(), "coldroom-test-"));
  const store = new JsonStore(dir);
  await store.init();
  return {
    dir,
    store,
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
};
