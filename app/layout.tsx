import type { Metadata } from "next";

import "@/app/globals.css";

export const metadata: Metadata = {
  title: "Description Studio | YouTube descriptions from a video link",
  description:
    "Paste a video link, pick a channel style and get an English transcript plus a publish-ready description with chapters and hashtags.",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body className="bg-canvas font-sans text-white antialiased">{children}</body>
    </html>
  );
}
