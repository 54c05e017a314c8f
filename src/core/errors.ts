export class ReportError extends Error {
  override name = "ReportError";
}

/** Bad CLI flags, bad menu selection, or input/output files that cannot be used. */
export class ConfigurationError extends ReportError {
  override name = "ConfigurationError";
}

/** A data line with too few fields or a salary that is not an integer. */
export class FormatError extends ReportError {
  override name = "FormatError";
}

export class EmptyReportError extends ReportError {
  override name = "EmptyReportError";
}
