import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "Industrial Heat Pump Estimator",
  description: "Screening estimate for heat pumps that upgrade industrial waste heat",
};

export default function EstimatorLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en-GB">
      <body>
        <header className="site-header">
          <strong>Heat pump screening</strong>
          <span>Waste-heat upgrade estimate for industrial processes</span>
        </header>
        {children}
        <footer className="site-footer">
          Indicative figures only. Costs in GBP, emissions in tonnes CO₂ per year, over a
          ten-year horizon.
        </footer>
      </body>
    </html>
  );
}
