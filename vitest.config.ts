import { configDefaults, defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        globals: true,
        environment: "node",
        include: ["test/**/*.spec.ts"],
        exclude: [...configDefaults.exclude, "dist/"],
        coverage: {
            provider: "v8",
            include: ["src/**/*.ts"],
        },
    },
});
