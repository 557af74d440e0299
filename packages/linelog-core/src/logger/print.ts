/**
 * linelog - print 函数门面
 *
 * 把 Printer 包装成可直接调用的 print，附带各级别方法。
 */

import type { EmitOptions, Printer } from "./printer.js";
import type { Severity } from "./types.js";

type PrintMethod = (...parts: unknown[]) => void;

export interface SeverityMethods {
  info: PrintMethod;
  success: PrintMethod;
  warning: PrintMethod;
  error: PrintMethod;
  debug: PrintMethod;
  critical: PrintMethod;
}

/** 绑定了选项（sep / end / file / flush）的一组调用 */
export type BoundPrint = PrintMethod & SeverityMethods;

/**
 * 可直接调用的 print：`print("...")` 等同 normal 级别，
 * `print.error(...)` 等按级别输出，`print.with({ end: "" })` 覆盖单次选项。
 */
export type PrintFunction = BoundPrint & {
  with(options: EmitOptions): BoundPrint;
  printer: Printer;
};

/** error / critical 默认立即 flush */
const FLUSH_BY_DEFAULT: ReadonlySet<Severity> = new Set<Severity>(["error", "critical"]);

function bind(printer: Printer, options: EmitOptions): BoundPrint {
  const at =
    (severity: Severity): PrintMethod =>
    (...parts) =>
      printer.emit(severity, parts, {
        ...options,
        flush: options.flush ?? FLUSH_BY_DEFAULT.has(severity),
      });

  return Object.assign(at("normal"), {
    info: at("info"),
    success: at("success"),
    warning: at("warning"),
    error: at("error"),
    debug: at("debug"),
    critical: at("critical"),
  });
}

export function createPrint(printer: Printer): PrintFunction {
  return Object.assign(bind(printer, {}), {
    with: (options: EmitOptions) => bind(printer, options),
    printer,
  });
}
