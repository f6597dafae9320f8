// ============================================
// Core Entity Types
// ============================================

export interface Student {
  id: string;
  firstName: string;
  lastName: string;
  email: string;
  createdAt: string;
  updatedAt: string;
}

export interface Assignment {
  id: string;
  studentId: string;
  title: string;
  description: string;
  dueDate: string;
  completed: boolean;
  createdAt: string;
  updatedAt: string;
}

// ============================================
// Request Types
// ============================================

/**
 * Fields a client may post; server-managed fields are excluded
 */
export type StudentInput = Omit<Student, 'id' | 'createdAt' | 'updatedAt'>;

export type AssignmentInput = Omit<Assignment, 'id' | 'createdAt' | 'updatedAt'>;

/**
 * Any stored record has a string id
 */
export interface Identifiable {
  id: string;
}
