import type { SalaryRecord } from "./records.js";

export type DepartmentSummary = {
  name: string;
  count: number;
  minSalary: number;
  maxSalary: number;
  averageSalary: number;
};

export type SummaryReport = DepartmentSummary[];

type SalaryAcc = {
  count: number;
  sum: bigint;
  min: number;
  max: number;
};

// Integer part and remainder are taken exactly, so the mean of safe integers stays within their range.
function averageOf(sum: bigint, count: number): number {
  const n = BigInt(count);
  return Number(sum / n) + Number(sum % n) / count;
}

export function summarizeSalaries(records: Iterable<SalaryRecord>): SummaryReport {
  // Map keeps departments in the order they first appear in the input.
  const byDepartment = new Map<string, SalaryAcc>();
  for (const r of records) {
    const acc = byDepartment.get(r.department);
    if (!acc) {
      byDepartment.set(r.department, { count: 1, sum: BigInt(r.salary), min: r.salary, max: r.salary });
      continue;
    }
    acc.count += 1;
    acc.sum += BigInt(r.salary);
    if (r.salary < acc.min) acc.min = r.salary;
    if (r.salary > acc.max) acc.max = r.salary;
  }

  return Array.from(byDepartment.entries()).map(([name, acc]) => ({
    name,
    count: acc.count,
    minSalary: acc.min,
    maxSalary: acc.max,
    averageSalary: averageOf(acc.sum, acc.count)
  }));
}
