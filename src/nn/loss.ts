import { Value } from "../frontend-value";
import type { Module } from "./module";

export interface SvmLossOptions {
  /** L2 regularization strength. */
  alpha?: number;
}

export interface LossResult {
  loss: Value;
  /** Fraction of predictions on the same side of zero as their target. */
  accuracy: number;
}

/**
 * Max-margin loss `mean(relu(1 - yᵢ·predᵢ)) + alpha·Σ p²` over targets in
 * {-1, 1}.
 */
export function svmLoss(
  model: Module<unknown, unknown>,
  preds: Value[],
  targets: number[],
  options: SvmLossOptions = {},
): LossResult {
  if (preds.length === 0) {
    throw new Error("svmLoss needs at least one prediction");
  }
  if (preds.length !== targets.length) {
    throw new Error(
      `svmLoss got ${preds.length} predictions for ${targets.length} targets`,
    );
  }
  const arena = preds[0].arena;
  const alpha = options.alpha ?? 1e-4;
  const n = preds.length;

  const margins = preds.map((pred, i) =>
    Value.fromScalar(1, arena)
      .add(Value.fromScalar(targets[i], arena).neg().mul(pred))
      .relu(),
  );
  const dataLoss = margins
    .reduce((acc, margin) => acc.add(margin))
    .mul(Value.fromScalar(1, arena).div(Value.fromScalar(n, arena)));

  const params = model.parameters();
  const loss =
    params.length === 0
      ? dataLoss
      : dataLoss.add(
          Value.fromScalar(alpha, arena).mul(
            params.map((p) => p.mul(p)).reduce((acc, sq) => acc.add(sq)),
          ),
        );

  let correct = 0;
  for (let i = 0; i < n; i += 1) {
    if ((targets[i] > 0) === (preds[i].data > 0)) correct += 1;
  }

  return { loss, accuracy: correct / n };
}
