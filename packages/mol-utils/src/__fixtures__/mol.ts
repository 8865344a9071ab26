export const pdbContent = `REMARK  generated for tests
ATOM      1 N1   MOL     1       1.000   2.000   3.000  1.00  0.00
ATOM      2 C1   MOL     1      -1.234   0.500  10.250  1.00  0.00
HETATM    9 ZN   ZN      2       9.000   9.000   9.000  1.00  0.00
ATOM      3 O1   MOL     1       0.000  -0.001 -12.500  1.00  0.00
TER
END
`

export const prepiContent = `    0    0    2

This is a remark line
molecule.res
MOL   INT  0
CORRECT     OMIT DU   BEG
  0.0000
   1  DUMM  DU    M    0  -1  -2     0.000      0.000      0.000   0.00000
   2  DUMM  DU    M    1   0  -1     1.449      0.000      0.000   0.00000
   3  DUMM  DU    M    2   1   0     1.523    111.210      0.000   0.00000
   4  N1    N     M    3   2   1     1.540    111.208    180.000   0.50000
   5  C1    C     M    4   3   2     1.470    110.000    -60.000  -0.30000
   6  O1    O     E    5   4   3     1.220    120.000    180.000  -0.20000


LOOP
   C1   N1
   4  X9    XX    M    3   2   1     1.540    111.208    180.000   0.50000

IMPROPER

DONE
STOP
`

export const topContent = `%VERSION  VERSION_STAMP = V0001.000  DATE = 01/01/24  00:00:00
%FLAG TITLE
%FORMAT(20a4)
MOL
%FLAG CHARGE
%FORMAT(5E16.8)
  9.11115000E+00 -5.46669000E+00 -3.64446000E+00
%FLAG ATOMIC_NUMBER
%FORMAT(10I8)
       7       6       8
`
