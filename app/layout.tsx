import type { ReactNode } from "react";

export const metadata = {
  title: "Pass/Fail Resolver",
  description: "Resolve PASS/FAIL markers in equipment test logs against their S/B criteria.",
};

export default function RootLayout({ children }: { children: ReactNode }) {
  return (
    <html lang="en">
      <body style={{ margin: 0, fontFamily: "system-ui, sans-serif", background: "#111827", color: "#f9fafb" }}>
        {children}
      </body>
    </html>
  );
}
