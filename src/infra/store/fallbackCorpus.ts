import type { PortfolioDocument } from "../../domain/types.js";

/** Served when no corpus file can be read. */
export const FALLBACK_CORPUS: readonly PortfolioDocument[] = [
  {
    id: "fallback_profil",
    category: "profil",
    title: "Profil Singkat",
    content:
      "Mahasiswa teknik informatika yang tertarik pada data science, algoritma, dan pengembangan web.",
    keywords: ["profil", "informatika", "mahasiswa"],
  },
  {
    id: "fallback_keahlian",
    category: "keahlian",
    title: "Keahlian Python & Web",
    content:
      "Menggunakan Python untuk analisis data dan TypeScript dengan React untuk membangun aplikasi web.",
    keywords: ["python", "typescript", "react", "data science"],
  },
  {
    id: "fallback_proyek",
    category: "proyek",
    title: "Proyek Puzzle Solver",
    content:
      "Solver puzzle yang membandingkan beberapa algoritma pathfinding beserta visualisasi langkahnya.",
    keywords: ["puzzle", "solver", "pathfinding"],
  },
  {
    id: "fallback_hobi",
    category: "hobi",
    title: "Hobi Membaca",
    content: "Suka membaca novel fantasi dan mendengarkan musik saat coding.",
    keywords: ["membaca", "novel", "musik"],
  },
];
