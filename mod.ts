export * from "@ramify/core";
