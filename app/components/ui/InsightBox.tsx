"use client";

import type { ReactNode } from "react";

type Props = {
  title: string;
  children?: ReactNode;
  className?: string;
};

export default function InsightBox({ title, children, className }: Props) {
  return (
    <div className={["border rounded-xl p-5 bg-white", className].filter(Boolean).join(" ")}>
      <div className="mb-3 text-base font-semibold text-gray-900">{title}</div>

      <div className="text-sm leading-6 text-gray-800">
        {children ? children : <div className="text-gray-500">No insights available.</div>}
      </div>
    </div>
  );
}
