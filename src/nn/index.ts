export { Layer, type LayerOptions } from "./layer";
export { type LossResult, svmLoss, type SvmLossOptions } from "./loss";
export { MLP } from "./mlp";
export { Module, type ModuleOptions } from "./module";
export { Neuron, type NeuronOptions } from "./neuron";
