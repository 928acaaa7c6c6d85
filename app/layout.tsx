import type { Metadata } from "next";
import "./globals.css";

import { NavBar } from "@/components/NavBar";

export const metadata: Metadata = {
  title: "FX Runway",
  description: "Treasury runway under multi-currency costs, hedged vs. unhedged",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body className="antialiased font-sans bg-[var(--background)] text-[var(--foreground)]">
        <NavBar />
        {children}
      </body>
    </html>
  );
}
