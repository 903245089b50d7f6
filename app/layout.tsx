import type { Metadata } from 'next';
import './globals.css';

export const metadata: Metadata = {
  title: 'Retorno real vs. IPCA',
  description:
    'Compare a rentabilidade de uma ação com a inflação (IPCA) e veja o retorno real pela equação de Fisher',
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>): React.ReactElement {
  return (
    <html lang="pt-BR">
      <body className="antialiased">{children}</body>
    </html>
  );
}
