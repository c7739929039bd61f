import type { Config } from "jest";

const config: Config = {
    preset: "ts-jest",
    testEnvironment: "node",
    moduleFileExtensions: ["js", "ts"],
    rootDir: ".",
    testMatch: ["**/test/**/*.test.ts"],
    setupFiles: ["reflect-metadata"],
};

export default config;
