export { linearDecay, type LinearDecayOptions, SGD, type SGDOptions } from "./sgd";
