// Generator identity, printed in generated module headers.

export const GENERATOR_NAME = "busbind-xmlgen";
export const GENERATOR_VERSION = "0.1.0";
