import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["supabase/functions/**/*_test.ts"],
    environment: "node",
  },
});
