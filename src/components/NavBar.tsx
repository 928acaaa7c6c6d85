"use client";

import Link from "next/link";
import { usePathname } from "next/navigation";

const isDev = process.env.NODE_ENV === "development";

const NAV_ITEMS: { href: string; label: string }[] = [
  { href: "/", label: "Dashboard" },
  ...(isDev ? [{ href: "/dev/health", label: "Engine Health" }] : []),
];

export function NavBar() {
  const pathname = usePathname();

  return (
    <nav className="border-b border-neutral-200 dark:border-neutral-700 px-6 py-3 flex items-center gap-6">
      <span className="font-semibold">FX Runway</span>
      <ul className="flex items-center gap-4 m-0 p-0 list-none">
        {NAV_ITEMS.map((item) => {
          const active = item.href === "/" ? pathname === "/" : pathname?.startsWith(item.href);
          return (
            <li key={item.href}>
              <Link
                href={item.href}
                className={`text-sm ${
                  active
                    ? "font-medium text-neutral-900 dark:text-neutral-100"
                    : "text-neutral-600 dark:text-neutral-400 hover:text-neutral-900 dark:hover:text-neutral-100"
                }`}
              >
                {item.label}
              </Link>
            </li>
          );
        })}
      </ul>
    </nav>
  );
}
